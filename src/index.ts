import { CommanderError, type Command } from "commander";

import { buildCli } from "./cli/index.js";
import { printCliError } from "./cli/error-output.js";

export { buildCli };

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = buildCli();
  installExitOverride(program);

  try {
    await program.parseAsync(argv);
  } catch (err) {
    // Commander has already printed usage errors; --help and --version exit cleanly.
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    const flags = program.opts<{ debug?: boolean; color?: boolean }>();
    printCliError(err, { debug: flags.debug, useColor: flags.color });
  }
}

function installExitOverride(command: Command): void {
  command.exitOverride();

  for (const child of command.commands) {
    installExitOverride(child);
  }
}
