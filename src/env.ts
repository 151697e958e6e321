import { config } from 'dotenv';
import type { LogLevel } from './ports/sys/LoggerPort';
import { parseLogLevel } from './adapters/sys/ConsoleLogger';

config();

export const DEFAULT_VERIFIER_HOST = 'http://localhost:8005';

export interface CliOptions {
  configPath?: string;
  logFile?: string;
  logLevel?: string;
  toolName?: string;
  params?: string;
  exampleName?: string;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case '--config':
        if (next) options.configPath = argv[++i];
        break;
      case '--log-file':
        if (next) options.logFile = argv[++i];
        break;
      case '--log-level':
        if (next) options.logLevel = argv[++i];
        break;
      case '--tool':
        if (next) options.toolName = argv[++i];
        break;
      case '--params':
        if (next) options.params = argv[++i];
        break;
      case '--example-name':
        if (next) options.exampleName = argv[++i];
        break;
      default:
        break;
    }
  }
  return options;
}

const cli = parseCliArgs(process.argv.slice(2));

export const FSTAR_VERIFIER_SERVER_HOST =
  process.env.FSTAR_VERIFIER_SERVER_HOST || DEFAULT_VERIFIER_HOST;
// TOOL_LOG_LEVEL is an alias of VERL_LOGGING_LEVEL
export const TOOL_LOG_LEVEL: LogLevel = parseLogLevel(
  cli.logLevel || process.env.VERL_LOGGING_LEVEL || process.env.TOOL_LOG_LEVEL
);

export const CONFIG_PATH = cli.configPath;
export const LOG_FILE = cli.logFile;
export const TOOL_NAME = cli.toolName;
export const TOOL_PARAMS = cli.params;
export const EXAMPLE_NAME = cli.exampleName;
