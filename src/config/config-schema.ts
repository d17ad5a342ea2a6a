import { z } from 'zod';
import type { StateStoreBackend } from '../ports/state-store.js';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const logLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error']);

/**
 * Monitor configuration file schema (data/config/monitor.json).
 *
 * Every section is optional; missing values fall back to DEFAULT_CONFIG.
 */
export const monitorConfigFileSchema = z
  .object({
    version: z.number().int().positive(),

    replay: z
      .object({
        /** CSV or RSS file replayed by the monitor */
        dataFile: z.string().min(1),
        /** Feed seconds per real second */
        acceleration: z.number().positive(),
        /** Cap on one pacing sleep */
        maxDelayMs: z.number().nonnegative(),
        /** Replay only the last N days of the feed (0 = all) */
        recentWindowDays: z.number().int().nonnegative(),
        /** Progress log interval in articles */
        progressEvery: z.number().int().nonnegative(),
      })
      .partial(),

    store: z
      .object({
        backend: z.enum(['memory', 'redis']),
        redisUrl: z.string().min(1),
        /** Namespace prepended to every Redis key */
        keyPrefix: z.string(),
        /** Wipe store state when the process starts */
        resetOnStart: z.boolean(),
      })
      .partial(),

    cleanup: z
      .object({
        /** Interval between TTL / window cleanups */
        intervalMs: z.number().int().positive(),
      })
      .partial(),

    api: z
      .object({
        enabled: z.boolean(),
        port: z.number().int().min(0).max(65535),
      })
      .partial(),

    logging: z
      .object({
        level: logLevel,
        pretty: z.boolean(),
        logDir: z.string().min(1),
      })
      .partial(),
  })
  .partial({ replay: true, store: true, cleanup: true, api: true, logging: true });

export type MonitorConfigFile = z.infer<typeof monitorConfigFileSchema>;

export type LogLevelName = z.infer<typeof logLevel>;

/**
 * Merged application configuration.
 *
 * Result of merging, lowest priority first:
 * 1. Hardcoded defaults
 * 2. Config file values
 * 3. Environment variables
 */
export interface MergedConfig {
  replay: {
    dataFile: string;
    acceleration: number;
    maxDelayMs: number;
    recentWindowDays: number;
    progressEvery: number;
  };

  store: {
    backend: StateStoreBackend;
    redisUrl: string;
    keyPrefix: string;
    resetOnStart: boolean;
  };

  cleanup: {
    intervalMs: number;
  };

  api: {
    enabled: boolean;
    port: number;
  };

  logging: {
    level: LogLevelName;
    pretty: boolean;
    logDir: string;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  replay: {
    dataFile: 'data/bbc_news.csv',
    acceleration: 1000,
    maxDelayMs: 500,
    recentWindowDays: 7,
    progressEvery: 10,
  },
  store: {
    backend: 'memory',
    redisUrl: 'redis://localhost:6379',
    keyPrefix: '',
    resetOnStart: true,
  },
  cleanup: {
    intervalMs: 60_000,
  },
  api: {
    enabled: true,
    port: 8000,
  },
  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: './data/logs',
  },
};
