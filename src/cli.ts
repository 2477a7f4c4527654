#!/usr/bin/env node
/**
 * cli.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Parse CLI args
 *   3. Load config (defaults + config file + environment)
 *   4. Initialise the logger
 *   5. Run one interactive cycle, or the hotplug listener with --listen
 *
 * Exit codes: 0 on success, cancellation, or a failure already reported
 * by notification; 1 when the output query failed; 2 on bad arguments
 * or configuration.
 */

import * as dotenv from 'dotenv';
import { initLogger, scopedLogger } from './core/logger';
import { loadConfig } from './core/config';
import { ConfigError, describeError } from './core/errors';
import { buildApp } from './app/wiring';

dotenv.config();

export interface CliOptions {
  listen: boolean;
  configPath?: string;
  help: boolean;
}

const USAGE = `Usage: screenswitch [--listen] [--config <path>]

  -l, --listen         watch DRM hotplug events and react to them
  -c, --config <path>  JSON config file (default: config/screenswitch.json)
  -h, --help           show this help`;

export function parseCli(argv: string[]): CliOptions {
  const options: CliOptions = { listen: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-l':
      case '--listen':
        options.listen = true;
        break;
      case '-c':
      case '--config': {
        const value = argv[i + 1];
        if (value === undefined) throw new ConfigError(`${arg} needs a path`);
        options.configPath = value;
        i++;
        break;
      }
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCli(process.argv.slice(2));
  } catch (e) {
    console.error(`${describeError(e)}\n\n${USAGE}`);
    return 2;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(options.configPath);
  initLogger(config);
  const log = scopedLogger('cli');
  const app = buildApp(config);

  if (options.listen) {
    const listener = app.createListener();
    const shutdown = (signal: NodeJS.Signals) => {
      log.info({ signal }, 'Received shutdown signal');
      listener.stop();
      process.exit(0);
    };
    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);

    log.info('Listening for display hotplug events');
    await listener.run();
    return 0;
  }

  const outcome = await app.cycle.runInteractive();
  log.debug({ outcome }, 'Cycle finished');
  return outcome.status === 'failed' && outcome.code === 'QUERY_ERROR' ? 1 : 0;
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error('Fatal error during startup:', describeError(e));
      process.exitCode = e instanceof ConfigError ? 2 : 1;
    });
}
