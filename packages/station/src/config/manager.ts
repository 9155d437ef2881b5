/**
 * Configuration Manager
 *
 * Station configuration stored as JSON. The file is looked up from an
 * explicit path, then `$GEOALERTS_CONFIG`, then `~/.geoalerts/config.json`.
 */

import { promises as fs } from 'fs';
import { homedir } from 'os';
import { join, dirname, resolve } from 'path';
import { AlertStoreError, LogLevel, resolveStoreConfig, type StoreConfig } from '@geoalerts/shared';
import { isLogLevel } from '../telemetry/logger';

export const CONFIG_ENV_VAR = 'GEOALERTS_CONFIG';

export interface StationConfig {
  alertsRoot?: string;
  deviceId?: string;
  logLevel?: LogLevel;
  inboxPath?: string;
  store?: Partial<StoreConfig>;
}

/**
 * Config with defaults applied
 */
export interface ResolvedStationConfig {
  alertsRoot: string;
  deviceId: string;
  logLevel: LogLevel;
  inboxPath: string;
  store: StoreConfig;
}

const NUMERIC_STORE_KEYS = [
  'bucketCapacity',
  'maxBucketPrecision',
  'lockTimeoutMs',
  'scanTimeoutMs',
  'defaultTtlSeconds',
  'maxWorkers',
] as const;

export function defaultConfigDir(): string {
  return join(homedir(), '.geoalerts');
}

/**
 * Pick the config file location
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) {
    return resolve(explicit);
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(defaultConfigDir(), 'config.json');
}

function invalid(message: string, path: string): AlertStoreError {
  return new AlertStoreError('Validation', `Invalid config ${path}: ${message}`, {
    operation: 'load',
    component: 'ConfigManager',
    data: { path },
  });
}

function optionalString(value: unknown, key: string, path: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(`${key} must be a non-empty string`, path);
  }
  return value;
}

function parseStoreOverrides(value: unknown, path: string): Partial<StoreConfig> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalid('store must be an object', path);
  }
  const entries = new Map<string, unknown>(Object.entries(value));
  const overrides: Partial<StoreConfig> = {};

  for (const key of NUMERIC_STORE_KEYS) {
    const raw = entries.get(key);
    if (raw === undefined) continue;
    if (typeof raw !== 'number' || !Number.isFinite(raw) || raw < 0) {
      throw invalid(`store.${key} must be a non-negative number`, path);
    }
    overrides[key] = raw;
  }

  const delays = entries.get('retryDelaysMs');
  if (delays !== undefined) {
    if (!Array.isArray(delays) || !delays.every((d): d is number => typeof d === 'number' && d >= 0)) {
      throw invalid('store.retryDelaysMs must be an array of non-negative numbers', path);
    }
    overrides.retryDelaysMs = delays;
  }

  return overrides;
}

/**
 * Validate parsed JSON into a StationConfig
 */
export function parseStationConfig(data: unknown, path: string): StationConfig {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw invalid('expected a JSON object', path);
  }
  const entries = new Map<string, unknown>(Object.entries(data));

  const logLevel = entries.get('logLevel');
  if (logLevel !== undefined && (typeof logLevel !== 'string' || !isLogLevel(logLevel))) {
    throw invalid(`logLevel must be one of ${Object.values(LogLevel).join(', ')}`, path);
  }

  const config: StationConfig = {};
  const alertsRoot = optionalString(entries.get('alertsRoot'), 'alertsRoot', path);
  const deviceId = optionalString(entries.get('deviceId'), 'deviceId', path);
  const inboxPath = optionalString(entries.get('inboxPath'), 'inboxPath', path);
  const store = parseStoreOverrides(entries.get('store'), path);

  if (alertsRoot) config.alertsRoot = alertsRoot;
  if (deviceId) config.deviceId = deviceId;
  if (inboxPath) config.inboxPath = inboxPath;
  if (typeof logLevel === 'string' && isLogLevel(logLevel)) config.logLevel = logLevel;
  if (store) config.store = store;
  return config;
}

export class ConfigManager {
  private config: StationConfig | null = null;

  constructor(private readonly configPath: string = resolveConfigPath()) {}

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from disk
   */
  async load(): Promise<StationConfig> {
    if (this.config) {
      return this.config;
    }

    let data: string;
    try {
      data = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      // Missing file means defaults
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.config = {};
        return this.config;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw invalid(error instanceof Error ? error.message : String(error), this.configPath);
    }
    this.config = parseStationConfig(parsed, this.configPath);
    return this.config;
  }

  /**
   * Save configuration to disk
   */
  async save(config: StationConfig): Promise<void> {
    this.config = config;

    await fs.mkdir(dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  async get<K extends keyof StationConfig>(key: K): Promise<StationConfig[K] | undefined> {
    const config = await this.load();
    return config[key];
  }

  async set<K extends keyof StationConfig>(key: K, value: StationConfig[K]): Promise<void> {
    const config = await this.load();
    config[key] = value;
    await this.save(config);
  }

  /**
   * Config with defaults for every field
   */
  async resolve(): Promise<ResolvedStationConfig> {
    const config = await this.load();
    const alertsRoot = config.alertsRoot ?? join(defaultConfigDir(), 'alerts');
    return {
      alertsRoot,
      deviceId: config.deviceId ?? 'UNKNOWN',
      logLevel: config.logLevel ?? LogLevel.Info,
      inboxPath: config.inboxPath ?? join(dirname(alertsRoot), 'inbox'),
      store: resolveStoreConfig(config.store),
    };
  }
}
