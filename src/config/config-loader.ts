import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError, describeError } from '../core/errors.js';
import type { MergedConfig, MonitorConfigFile, LogLevelName } from './config-schema.js';
import { CONFIG_FILE_VERSION, DEFAULT_CONFIG, monitorConfigFileSchema } from './config-schema.js';

const LOG_LEVELS: readonly LogLevelName[] = ['trace', 'debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/monitor.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configPath = 'data/config', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   *
   * @throws ConfigError when the file or an environment value is invalid
   */
  async load(): Promise<MergedConfig> {
    const file = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);

    if (file) {
      this.mergeConfigFile(config, file);
    }

    this.mergeEnvironment(config);

    return config;
  }

  private async loadConfigFile(): Promise<MonitorConfigFile | null> {
    const filePath = join(this.configPath, 'monitor.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // No file - defaults and env only
        return null;
      }
      throw new ConfigError(`Failed to read config file ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content) as unknown;
    } catch (error) {
      throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
    }

    const result = monitorConfigFileSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config file ${filePath}: ${details}`, { cause: result.error });
    }

    if (result.data.version > CONFIG_FILE_VERSION) {
      throw new ConfigError(
        `Config file version (${String(result.data.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return result.data;
  }

  private mergeConfigFile(config: MergedConfig, file: MonitorConfigFile): void {
    config.replay = { ...config.replay, ...file.replay };
    config.store = { ...config.store, ...file.store };
    config.cleanup = { ...config.cleanup, ...file.cleanup };
    config.api = { ...config.api, ...file.api };
    config.logging = { ...config.logging, ...file.logging };
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const dataFile = this.env['DATA_FILE'];
    if (dataFile) {
      config.replay.dataFile = dataFile;
    }

    const acceleration = this.env['TIME_ACCELERATION'];
    if (acceleration) {
      const value = Number(acceleration);
      if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`TIME_ACCELERATION must be a positive number, got "${acceleration}"`);
      }
      config.replay.acceleration = value;
    }

    // REDIS_URL alone switches to the shared store; STORE_BACKEND wins if both are set
    const redisUrl = this.env['REDIS_URL'];
    if (redisUrl) {
      config.store.redisUrl = redisUrl;
      config.store.backend = 'redis';
    }

    const backend = this.env['STORE_BACKEND'];
    if (backend) {
      if (backend !== 'memory' && backend !== 'redis') {
        throw new ConfigError(`STORE_BACKEND must be "memory" or "redis", got "${backend}"`);
      }
      config.store.backend = backend;
    }

    const port = this.env['PORT'];
    if (port) {
      const value = Number(port);
      if (!Number.isInteger(value) || value < 0 || value > 65535) {
        throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${port}"`);
      }
      config.api.port = value;
    }

    const level = this.env['LOG_LEVEL'];
    if (level) {
      if (!isLogLevel(level)) {
        throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`);
      }
      config.logging.level = level;
    }

    if (this.env['NODE_ENV'] === 'production') {
      config.logging.pretty = false;
    }
  }
}

/**
 * Create a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Convenience function to load config.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  const loader = createConfigLoader(configPath);
  return loader.load();
}
