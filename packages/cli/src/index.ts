#!/usr/bin/env node

import { CommanderError } from "commander";
import { createClientFromEnv } from "./commands/shared";
import { buildProgram } from "./program";
import { ConsoleOutputService } from "./services/console-output.service";

const output = new ConsoleOutputService();
const program = buildProgram({ output, createClient: createClientFromEnv });

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error: unknown) {
    output.stopSpinner();
    if (error instanceof CommanderError) {
      // Commander has already printed help, the version or its own message
      process.exit(error.exitCode);
    }
    output.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

void main();
