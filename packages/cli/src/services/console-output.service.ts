import chalk from "chalk";
import ora from "ora";
import type { Ora } from "ora";
import type { IOutputService } from "../interfaces/output.interface";

/** Terminal output: chalk for colour, ora for the in-flight spinner. */
export class ConsoleOutputService implements IOutputService {
  private spinner: Ora | null = null;

  header(title: string): void {
    console.log(chalk.blue.bold(title));
  }

  info(message: string): void {
    console.log(message);
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠ ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }

  dim(message: string): void {
    console.log(chalk.gray(message));
  }

  json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  newline(): void {
    console.log();
  }

  startSpinner(text: string): void {
    this.stopSpinner();
    this.spinner = ora(text).start();
  }

  stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
