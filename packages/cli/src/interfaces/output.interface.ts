/**
 * Output Service Interface
 *
 * Everything a command prints goes through this seam so handlers can be
 * exercised without a terminal.
 */

export interface IOutputService {
  /** Bold section title. */
  header(title: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  /** Written to stderr. */
  error(message: string): void;
  dim(message: string): void;
  /** Pretty-printed JSON on stdout. */
  json(value: unknown): void;
  newline(): void;

  startSpinner(text: string): void;
  stopSpinner(): void;
}
