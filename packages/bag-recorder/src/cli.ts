/**
 * Command-line parsing for the bag-recorder entry point.
 */

import { DEFAULT_BRIDGE_URL, ENV_BRIDGE_URL, ENV_CONFIG_PATH, PACKAGE_NAME } from './constants.js';
import type { ConfigOverrides } from './config/config-loader.js';
import { InvalidConfigError } from './errors.js';
import type { LogFormat } from './utils/logger.js';

export interface CliOptions {
  bridgeUrl: string;
  configPath?: string;
  overrides: ConfigOverrides;
  verbose: boolean;
  logFormat: LogFormat;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: CliOptions };

export const USAGE = `
${PACKAGE_NAME} - Record ROS2 topics to rotating bag directories

Usage: ${PACKAGE_NAME} [options]

Options:
  --config <path>         YAML parameter file (flat or ros__parameters)
  --bridge-url <url>      WebSocket URL for the ROS2 bridge (default: ${DEFAULT_BRIDGE_URL})
  --data-folder <dir>     Base directory for bag output
  --file-duration <sec>   Rotate storage files after this many seconds
  --topics <a,b,...>      Topics to record, or "*" for all topics
  --verbose               Enable debug logging
  --log-format <fmt>      "text" (default) or "json"
  --version               Show version number
  --help                  Show this help message

Environment variables:
  ${ENV_BRIDGE_URL}   Same as --bridge-url
  ${ENV_CONFIG_PATH}       Same as --config

Publish {enable_recording: true|false} on the control topic to start or stop recording.
`;

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  if (argv.includes('--help') || argv.includes('-h')) return { kind: 'help' };
  if (argv.includes('--version') || argv.includes('-v')) return { kind: 'version' };

  const options: CliOptions = {
    bridgeUrl: env[ENV_BRIDGE_URL] || DEFAULT_BRIDGE_URL,
    configPath: env[ENV_CONFIG_PATH] || undefined,
    overrides: {},
    verbose: false,
    logFormat: 'text',
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = (): string => {
      const next = argv[++i];
      if (next === undefined || next.startsWith('--')) {
        throw new InvalidConfigError(`${flag} requires a value`);
      }
      return next;
    };

    switch (flag) {
      case '--config':
        options.configPath = value();
        break;
      case '--bridge-url':
        options.bridgeUrl = value();
        break;
      case '--data-folder':
        options.overrides.dataFolder = value();
        break;
      case '--file-duration': {
        const raw = value();
        if (!/^\d+$/.test(raw)) {
          throw new InvalidConfigError(`--file-duration must be a whole number of seconds, got: ${raw}`);
        }
        options.overrides.fileDuration = parseInt(raw, 10);
        break;
      }
      case '--topics':
        options.overrides.loggedTopics = value().split(',').map((t) => t.trim());
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--log-format': {
        const format = value();
        if (format !== 'text' && format !== 'json') {
          throw new InvalidConfigError(`--log-format must be "text" or "json", got: ${format}`);
        }
        options.logFormat = format;
        break;
      }
      default:
        throw new InvalidConfigError(`Unknown option: ${flag}`);
    }
  }

  return { kind: 'run', options };
}
