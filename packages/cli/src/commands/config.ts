/**
 * config subcommand — manage the configuration file.
 *
 * Subcommands:
 *   init   Generate a config file template
 *   path   Show the config file path
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { getDefaultConfigPath } from '../config.js';
import { CliError, println, errorln } from './output.js';

const USAGE = `\
Usage: notiqd config <subcommand>

Manage the configuration file.

Subcommands:
  init    Generate a config file template
  path    Show the config file path

Options:
  --help, -h  Show this help message`;

export const CONFIG_TEMPLATE = `\
{
  "logLevel": "info",
  "displayedLimit": 5,
  "indicateHidden": true,
  "stackDuplicates": true,
  "showAgeThresholdMs": 60000,
  "timeouts": {
    "low": 10000,
    "normal": 10000,
    "critical": 0
  },
  "fullscreen": {
    "low": "delay",
    "normal": "delay",
    "critical": "show"
  },
  "history": {
    "length": 20,
    "sticky": true
  }
}
`;

export async function runConfigCommand(args: string[]): Promise<void> {
  const subcommand = args[0];
  const subArgs = args.slice(1);

  switch (subcommand) {
    case 'init':
      await runConfigInit(subArgs);
      break;
    case 'path':
      runConfigPath(subArgs);
      break;
    case '--help':
    case '-h':
    case undefined:
      println(USAGE);
      break;
    default:
      throw new CliError(`Unknown config subcommand: ${subcommand}\n\n${USAGE}`);
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  }
  catch {
    return false;
  }
}

async function runConfigInit(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      force: { type: 'boolean', short: 'f' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help === true) {
    println(`\
Usage: notiqd config init [options]

Generate a config file template.

Options:
  --force, -f  Overwrite existing config file
  --help, -h   Show this help message`);
    return;
  }

  const configPath = getDefaultConfigPath();

  if (values.force !== true && await fileExists(configPath)) {
    errorln(`Config file already exists: ${configPath}`);
    throw new CliError('Use --force to overwrite.');
  }

  await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
  await fs.promises.writeFile(configPath, CONFIG_TEMPLATE, 'utf-8');
  println(`Config file created: ${configPath}`);
}

function runConfigPath(args: string[]): void {
  const { values } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help === true) {
    println(`\
Usage: notiqd config path

Show the config file path.

Options:
  --help, -h  Show this help message`);
    return;
  }

  println(getDefaultConfigPath());
}
