/**
 * CLI entry point for notiqd.
 *
 * Routes to subcommands: run, send, ctl, config.
 */

import { runConfigCommand } from './commands/config.js';
import { runCtlCommand } from './commands/ctl.js';
import { CliError } from './commands/output.js';
import { runRunCommand } from './commands/run.js';
import { runSendCommand } from './commands/send.js';

const USAGE = `\
Usage: notiqd <command> [options]

Commands:
  run      Start the notification daemon
  send     Queue a notification
  ctl      Control the running daemon
  config   Manage configuration file

Run 'notiqd <command> --help' for more information on a command.`;

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const subArgs = args.slice(1);

  switch (command) {
    case 'run':
      await runRunCommand(subArgs);
      break;
    case 'send':
      await runSendCommand(subArgs);
      break;
    case 'ctl':
      await runCtlCommand(subArgs);
      break;
    case 'config':
      await runConfigCommand(subArgs);
      break;
    case '--help':
    case '-h':
    case undefined:
      console.log(USAGE);
      break;
    default:
      console.error(`Unknown command: ${command}\n`);
      console.error(USAGE);
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  if (error instanceof CliError) {
    console.error(error.message);
    process.exit(error.exitCode);
  }
  console.error(
    `fatal: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
