import { formatEventDetails, withClient, type CommandContext, type GlobalOptions } from "./shared";

export async function getCommand(
  eventId: string,
  options: GlobalOptions,
  ctx: CommandContext,
): Promise<void> {
  const event = await withClient(ctx, options, "Fetching event...", (client) => client.getEvent(eventId));

  if (options.json) {
    ctx.output.json(event);
    return;
  }
  ctx.output.header(`Event ${event.id}`);
  for (const line of formatEventDetails(event)) {
    ctx.output.info(line);
  }
}
