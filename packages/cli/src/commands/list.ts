import { formatEventLine, withClient, type CommandContext, type GlobalOptions } from "./shared";

export interface ListCommandOptions extends GlobalOptions {
  page?: number;
  pageSize?: number;
  user?: string;
  action?: string;
}

export async function listCommand(options: ListCommandOptions, ctx: CommandContext): Promise<void> {
  const page = await withClient(ctx, options, "Fetching events...", (client) =>
    client.listEvents({
      page: options.page,
      pageSize: options.pageSize,
      userId: options.user,
      action: options.action,
    }),
  );

  if (options.json) {
    ctx.output.json(page);
    return;
  }

  ctx.output.header(`Events (page ${page.page}, ${page.events.length} of ${page.total})`);
  if (page.events.length === 0) {
    ctx.output.dim("No events found");
    return;
  }
  for (const event of page.events) {
    ctx.output.info(formatEventLine(event));
  }
  if (page.has_next) {
    ctx.output.dim(`More events: --page ${page.page + 1}`);
  }
}
