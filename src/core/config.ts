/**
 * core/config.ts
 *
 * Loads the application config: built-in defaults, overlaid by an
 * optional JSON file (validated with ajv), overlaid by environment
 * variables. Resolution order for the file:
 *   1. explicit path (--config)
 *   2. SCREENSWITCH_CONFIG
 *   3. config/screenswitch.json under the cwd, if present
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Ajv from 'ajv';
import { AppConfig, LogLevel } from './types';
import { ConfigError, describeError } from './errors';

const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export type FileConfig = Partial<Omit<AppConfig, 'commands' | 'picker' | 'timeouts' | 'hotplug'>> & {
  commands?: Partial<AppConfig['commands']>;
  picker?: Partial<AppConfig['picker']>;
  timeouts?: Partial<AppConfig['timeouts']>;
  hotplug?: Partial<AppConfig['hotplug']>;
};

const stringMap = (keys: string[]) => ({
  type: 'object',
  additionalProperties: false,
  properties: Object.fromEntries(keys.map(k => [k, { type: 'string', minLength: 1 }]))
});

const durationMap = (keys: string[]) => ({
  type: 'object',
  additionalProperties: false,
  properties: Object.fromEntries(keys.map(k => [k, { type: 'integer', minimum: 0 }]))
});

const fileConfigSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    logLevel:        { type: 'string', enum: LOG_LEVELS },
    runtimeDir:      { type: 'string', minLength: 1 },
    pidFileName:     { type: 'string', minLength: 1, pattern: '^[^/]+$' },
    presentMode:     { type: 'string', pattern: '^[0-9]+x[0-9]+$' },
    wallpaperScript: { type: 'string', minLength: 1 },
    commands: stringMap(['xrandr', 'picker', 'notify', 'dunstctl', 'xset', 'herbstclient', 'panel', 'udevadm']),
    picker: {
      type: 'object',
      additionalProperties: false,
      properties: {
        extraArgs: { type: 'array', items: { type: 'string' } }
      }
    },
    timeouts: durationMap(['queryMs', 'applyMs', 'pickerMs', 'effectMs', 'killGraceMs']),
    hotplug: durationMap(['restartDelayMs'])
  }
};

const ajv = new Ajv({ allErrors: true });
const validateFileConfig = ajv.compile<FileConfig>(fileConfigSchema);

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    logLevel: 'info',
    runtimeDir: env.XDG_RUNTIME_DIR ?? os.tmpdir(),
    pidFileName: 'screenswitch.pid',
    presentMode: '1920x1080',
    wallpaperScript: path.join(os.homedir(), '.fehbg'),
    commands: {
      xrandr: 'xrandr',
      picker: 'rofi',
      notify: 'notify-send',
      dunstctl: 'dunstctl',
      xset: 'xset',
      herbstclient: 'herbstclient',
      panel: 'barpyrus',
      udevadm: 'udevadm'
    },
    picker: { extraArgs: ['-m', 'primary'] },
    timeouts: {
      queryMs: 10_000,
      applyMs: 30_000,
      pickerMs: 10 * 60_000,
      effectMs: 10_000,
      killGraceMs: 2_000
    },
    hotplug: { restartDelayMs: 5_000 }
  };
}

/** Parses and validates the raw text of a config file. */
export function parseConfigFile(raw: string, source: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Config file ${source} is not valid JSON: ${describeError(e)}`, { source });
  }

  if (!validateFileConfig(parsed)) {
    const violations = (validateFileConfig.errors ?? []).map(err => `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`);
    throw new ConfigError(`Config file ${source} is invalid: ${violations.join('; ')}`, { source, violations });
  }
  return parsed;
}

export function mergeConfig(base: AppConfig, file: FileConfig): AppConfig {
  return {
    ...base,
    ...file,
    commands: { ...base.commands, ...file.commands },
    picker: { ...base.picker, ...file.picker },
    timeouts: { ...base.timeouts, ...file.timeouts },
    hotplug: { ...base.hotplug, ...file.hotplug }
  };
}

function locateConfigFile(explicitPath: string | undefined, env: NodeJS.ProcessEnv): string | undefined {
  if (explicitPath) return path.resolve(explicitPath);
  if (env.SCREENSWITCH_CONFIG) return path.resolve(env.SCREENSWITCH_CONFIG);

  const conventional = path.resolve(process.cwd(), 'config', 'screenswitch.json');
  return fs.existsSync(conventional) ? conventional : undefined;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let config = defaultConfig(env);

  const configPath = locateConfigFile(explicitPath, env);
  if (configPath) {
    let raw: string;
    try {
      raw = fs.readFileSync(configPath, 'utf-8');
    } catch (e) {
      throw new ConfigError(`Cannot read config file ${configPath}: ${describeError(e)}`, { source: configPath });
    }
    config = mergeConfig(config, parseConfigFile(raw, configPath));
  }

  const envLevel = env.SCREENSWITCH_LOG_LEVEL;
  if (envLevel) {
    const level = LOG_LEVELS.find(l => l === envLevel);
    if (!level) {
      throw new ConfigError(`SCREENSWITCH_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`, { value: envLevel });
    }
    config.logLevel = level;
  }

  return config;
}

/** Absolute path of the session marker file. */
export function markerPath(config: Pick<AppConfig, 'runtimeDir' | 'pidFileName'>): string {
  return path.join(config.runtimeDir, config.pidFileName);
}
