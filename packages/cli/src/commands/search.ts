import { formatEventLine, withClient, type CommandContext, type GlobalOptions } from "./shared";

export interface SearchCommandOptions extends GlobalOptions {
  limit?: number;
}

export async function searchCommand(
  query: string,
  options: SearchCommandOptions,
  ctx: CommandContext,
): Promise<void> {
  const result = await withClient(ctx, options, "Searching...", (client) =>
    client.searchEvents(query, options.limit),
  );

  if (options.json) {
    ctx.output.json(result);
    return;
  }

  ctx.output.header(`${result.count} result(s) for "${query}"`);
  if (!result.has_embeddings) {
    ctx.output.dim("Keyword match only (semantic index unavailable)");
  }
  if (result.results.length === 0) {
    ctx.output.dim("No matching events");
    return;
  }
  for (const event of result.results) {
    ctx.output.info(formatEventLine(event));
  }
}
