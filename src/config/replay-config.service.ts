import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { existsSync, readFileSync } from 'node:fs';
import { ReplayConfig, ReplayConfigOverrides } from './replay-config';
import { InvalidConfigError } from '../common/errors/replay.errors';

export const CONFIG_SOURCE = Symbol('CONFIG_SOURCE');

export interface ConfigSource {
  env?: NodeJS.ProcessEnv;
  configFile?: string;
}

export const DEFAULT_CONFIG_FILE = 'config.json';

// Environment variable → config key
const ENV_KEYS: Record<string, keyof ReplayConfig> = {
  INITIAL_CAPITAL: 'initialCapital',
  MAX_STOCKS: 'maxStocks',
  STOCK_LIMIT_POLICY: 'stockLimitPolicy',
  INPUT_DIR: 'inputDir',
  OUTPUT_DIR: 'outputDir',
  PORT: 'port',
};

/**
 * Layers defaults ← JSON config file ← environment ← explicit overrides,
 * then validates the result. An invalid layer fails fast.
 */
@Injectable()
export class ReplayConfigService {
  private readonly logger = new Logger(ReplayConfigService.name);
  private readonly layers: ReplayConfigOverrides[];
  private config: ReplayConfig;

  constructor(@Optional() @Inject(CONFIG_SOURCE) source?: ConfigSource) {
    const env = source?.env ?? process.env;
    const configFile = source?.configFile ?? env.REPLAY_CONFIG ?? DEFAULT_CONFIG_FILE;

    this.layers = [this.readConfigFile(configFile), this.readEnv(env)];
    this.config = this.build(this.layers);
  }

  get(): ReplayConfig {
    return this.config;
  }

  /** Re-validates with CLI-level overrides on top of every other layer. */
  applyOverrides(overrides: ReplayConfigOverrides): ReplayConfig {
    this.config = this.build([...this.layers, overrides]);
    return this.config;
  }

  private build(layers: ReplayConfigOverrides[]): ReplayConfig {
    const merged = Object.assign({}, ...layers.map(definedOnly));
    const config = plainToInstance(ReplayConfig, merged);
    const errors = validateSync(config, { whitelist: true, forbidUnknownValues: true });

    if (errors.length > 0) {
      throw new InvalidConfigError(`Invalid configuration: ${describe(errors)}`);
    }
    return config;
  }

  private readConfigFile(path: string): ReplayConfigOverrides {
    if (!existsSync(path)) {
      this.logger.debug(`No config file at ${path}, using defaults`);
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(`Cannot read config file ${path}: ${reason}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new InvalidConfigError(`Config file ${path} must contain a JSON object`);
    }

    const layer: ReplayConfigOverrides = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (!isConfigKey(key)) {
        this.logger.warn(`Ignoring unknown config key "${key}" in ${path}`);
        continue;
      }
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw new InvalidConfigError(`Config key "${key}" in ${path} must be a string or a number`);
      }
      layer[key] = value;
    }

    this.logger.log(`Loaded configuration from ${path}`);
    return layer;
  }

  private readEnv(env: NodeJS.ProcessEnv): ReplayConfigOverrides {
    const layer: ReplayConfigOverrides = {};
    for (const [variable, key] of Object.entries(ENV_KEYS)) {
      const value = env[variable];
      if (value !== undefined && value !== '') {
        layer[key] = value;
      }
    }
    return layer;
  }
}

const CONFIG_KEYS = new Set<string>(Object.values(ENV_KEYS));

function isConfigKey(key: string): key is keyof ReplayConfig {
  return CONFIG_KEYS.has(key);
}

function definedOnly(layer: ReplayConfigOverrides): ReplayConfigOverrides {
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

function describe(errors: ValidationError[]): string {
  return errors
    .map((error) => `${error.property} (${Object.values(error.constraints ?? {}).join(', ')})`)
    .join('; ');
}
