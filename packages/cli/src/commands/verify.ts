import { LogVaultError } from "@logvault/client";
import type { VerificationResult } from "@logvault/client";
import { withClient, type CommandContext, type GlobalOptions } from "./shared";

/**
 * Check an event's signature. An invalid signature is reported as an error
 * so the process exits non-zero.
 */
export async function verifyCommand(
  eventId: string,
  options: GlobalOptions,
  ctx: CommandContext,
): Promise<VerificationResult> {
  const result = await withClient(ctx, options, "Verifying signature...", (client) =>
    client.verifyEvent(eventId),
  );

  if (options.json) {
    ctx.output.json(result);
  }
  if (!result.valid) {
    const reason = result.reason ? ` (${result.reason})` : "";
    throw new LogVaultError(`Event ${eventId}: signature is invalid${reason}`);
  }
  if (!options.json) {
    ctx.output.success(`Event ${eventId}: signature is valid`);
  }
  return result;
}
