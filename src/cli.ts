#!/usr/bin/env node

import { reportStartupFailure, runServer } from './index';
import { getVersion } from './utils';

export interface CliArgs {
  configPath?: string;
  port?: number;
  host?: string;
  help?: boolean;
  version?: boolean;
}

function printHelp(): void {
  console.log(`
LLM Launcher - control server for a single llama-server process

Usage: llm-launcher [options]

Options:
  -c, --config <path>   Config file (default: ./config.json, env: CONFIG_PATH)
  -p, --port <port>     Control server port (overrides config, env: PORT)
  -h, --host <host>     Control server host (overrides config, env: HOST)
  -v, --version         Show version number
  --help                Show this help message

Environment Variables:
  CONFIG_PATH           Config file path
  PORT                  Control server port
  HOST                  Control server host
  LOG_LEVEL             Log level (debug/info/warn/error)

Examples:
  llm-launcher                          Start with ./config.json
  llm-launcher -c /etc/llm/config.json  Use another config file
  llm-launcher -p 9000                  Listen on port 9000
`);
}

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help') {
      result.help = true;
    } else if (arg === '-v' || arg === '--version') {
      result.version = true;
    } else if (arg === '-p' || arg === '--port') {
      const portStr = args[++i];
      const port = portStr ? parseInt(portStr, 10) : NaN;

      if (isNaN(port) || port < 1 || port > 65535) {
        throw new CliArgumentError(`Invalid port: ${portStr ?? '(missing)'}`);
      }

      result.port = port;
    } else if (arg === '-h' || arg === '--host') {
      const host = args[++i];

      if (!host) {
        throw new CliArgumentError('Missing value for --host');
      }

      result.host = host;
    } else if (arg === '-c' || arg === '--config') {
      const configPath = args[++i];

      if (!configPath) {
        throw new CliArgumentError('Missing value for --config');
      }

      result.configPath = configPath;
    } else {
      throw new CliArgumentError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    console.log(`llm-launcher v${getVersion()}`);
    process.exit(0);
  }

  await runServer({
    configPath: args.configPath,
    overrides: { port: args.port, host: args.host },
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof CliArgumentError) {
      console.error(error.message);
      printHelp();
    } else {
      reportStartupFailure(error);
    }
    process.exit(1);
  });
}
