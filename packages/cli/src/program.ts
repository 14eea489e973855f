import { Command } from "commander";
import { EVENT_LEVELS, SDK_VERSION } from "@logvault/client";
import { getCommand } from "./commands/get";
import { listCommand, type ListCommandOptions } from "./commands/list";
import { logCommand, type LogCommandOptions } from "./commands/log";
import { searchCommand, type SearchCommandOptions } from "./commands/search";
import { parseInteger, type CommandContext, type GlobalOptions } from "./commands/shared";
import { verifyCommand } from "./commands/verify";

function withGlobalOptions(command: Command): Command {
  return command
    .option("--api-key <key>", "API key (default: $LOGVAULT_API_KEY)")
    .option("--base-url <url>", "API base URL (default: $LOGVAULT_BASE_URL)")
    .option("--json", "Print the raw JSON response");
}

/**
 * Build the `logvault` program. Commander errors are thrown rather than
 * exiting, and so is anything a command throws.
 */
export function buildProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name("logvault")
    .description("LogVault CLI - record, query and verify audit events")
    .version(SDK_VERSION)
    .exitOverride();

  withGlobalOptions(program.command("log <action>"))
    .description("Record an audit event (action format: domain.event)")
    .option("-u, --user <id>", "User who performed the action")
    .option("-r, --resource <resource>", "Resource acted upon")
    .option("-l, --level <level>", `Severity: ${EVENT_LEVELS.join(", ")}`)
    .option("-m, --message <text>", "Free-form description")
    .option("--metadata <json>", "Extra fields as a JSON object")
    .action(async (action: string, options: LogCommandOptions) => {
      await logCommand(action, options, ctx);
    });

  withGlobalOptions(program.command("list"))
    .description("List recorded events, newest first")
    .option("-p, --page <n>", "Page number (1-based)", parseInteger)
    .option("-s, --page-size <n>", "Events per page (max 100)", parseInteger)
    .option("-u, --user <id>", "Only events by this user")
    .option("-a, --action <action>", "Only events with this action")
    .action(async (options: ListCommandOptions) => {
      await listCommand(options, ctx);
    });

  withGlobalOptions(program.command("get <id>"))
    .description("Show a single event")
    .action(async (id: string, options: GlobalOptions) => {
      await getCommand(id, options, ctx);
    });

  withGlobalOptions(program.command("verify <id>"))
    .description("Verify an event's signature")
    .action(async (id: string, options: GlobalOptions) => {
      await verifyCommand(id, options, ctx);
    });

  withGlobalOptions(program.command("search <query>"))
    .description("Search events by free text")
    .option("-n, --limit <n>", "Maximum results", parseInteger)
    .action(async (query: string, options: SearchCommandOptions) => {
      await searchCommand(query, options, ctx);
    });

  return program;
}
