import { ConfigurationError } from '../core/errors.js';
import type { RunnerFactory, TransactionFactory } from '../core/execution/statement-runner.js';
import { MetadataRegistry } from '../reflection/metadata-registry.js';
import { DefaultObjectFactory, type ObjectFactory } from '../reflection/object-factory.js';
import { consoleWarningLogger, type QueryLogger, type WarningLogger } from './query-logger.js';

/**
 * `SESSION` keeps cached rows until the next write, commit, rollback or close;
 * `STATEMENT` clears them whenever the outermost query returns.
 */
export type LocalCacheScope = 'SESSION' | 'STATEMENT';

const LOCAL_CACHE_SCOPES: readonly LocalCacheScope[] = ['SESSION', 'STATEMENT'];

/**
 * Where sessions get their transactions and runners. The id becomes part of
 * every cache key.
 */
export interface Environment {
  id: string;
  transactionFactory: TransactionFactory;
  runnerFactory: RunnerFactory;
}

export interface ConfigurationOptions {
  localCacheScope?: LocalCacheScope;
  environment?: Environment;
  metadataRegistry?: MetadataRegistry;
  /** Memoize property metadata per type (ignored when a registry is passed) */
  reflectionCacheEnabled?: boolean;
  objectFactory?: ObjectFactory;
  /** Seconds */
  defaultStatementTimeout?: number;
  defaultFetchSize?: number;
  queryLogger?: QueryLogger;
  warningLogger?: WarningLogger;
}

export interface Configuration {
  readonly localCacheScope: LocalCacheScope;
  readonly environment?: Environment;
  readonly metadataRegistry: MetadataRegistry;
  readonly objectFactory: ObjectFactory;
  readonly defaultStatementTimeout?: number;
  readonly defaultFetchSize?: number;
  readonly queryLogger?: QueryLogger;
  readonly warningLogger: WarningLogger;
}

const isLocalCacheScope = (value: unknown): value is LocalCacheScope =>
  LOCAL_CACHE_SCOPES.some(scope => scope === value);

const assertPositiveInteger = (name: string, value: number | undefined): void => {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`, { details: { setting: name, value } });
  }
};

export const createConfiguration = (options: ConfigurationOptions = {}): Configuration => {
  const localCacheScope = options.localCacheScope ?? 'SESSION';
  if (!isLocalCacheScope(localCacheScope)) {
    throw new ConfigurationError(`Unknown local cache scope '${String(localCacheScope)}'`, {
      details: { setting: 'localCacheScope', value: localCacheScope },
    });
  }
  assertPositiveInteger('defaultStatementTimeout', options.defaultStatementTimeout);
  assertPositiveInteger('defaultFetchSize', options.defaultFetchSize);

  const metadataRegistry =
    options.metadataRegistry ?? new MetadataRegistry({ cacheEnabled: options.reflectionCacheEnabled ?? true });

  return Object.freeze({
    localCacheScope,
    environment: options.environment,
    metadataRegistry,
    objectFactory: options.objectFactory ?? new DefaultObjectFactory(metadataRegistry),
    defaultStatementTimeout: options.defaultStatementTimeout,
    defaultFetchSize: options.defaultFetchSize,
    queryLogger: options.queryLogger,
    warningLogger: options.warningLogger ?? consoleWarningLogger,
  });
};

type SettingParser = (value: string, options: ConfigurationOptions) => void;

const parseBoolean = (name: string, value: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ConfigurationError(`Setting ${name} expects true or false, got '${value}'`, {
    details: { setting: name, value },
  });
};

const parseInteger = (name: string, value: string): number => {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Setting ${name} expects a positive integer, got '${value}'`, {
      details: { setting: name, value },
    });
  }
  return parsed;
};

const SETTINGS: Record<string, SettingParser> = {
  localCacheScope: (value, options) => {
    const scope = value.trim().toUpperCase();
    if (!isLocalCacheScope(scope)) {
      throw new ConfigurationError(`Setting localCacheScope expects SESSION or STATEMENT, got '${value}'`, {
        details: { setting: 'localCacheScope', value },
      });
    }
    options.localCacheScope = scope;
  },
  cacheEnabled: (value, options) => {
    options.reflectionCacheEnabled = parseBoolean('cacheEnabled', value);
  },
  defaultStatementTimeout: (value, options) => {
    options.defaultStatementTimeout = parseInteger('defaultStatementTimeout', value);
  },
  defaultFetchSize: (value, options) => {
    options.defaultFetchSize = parseInteger('defaultFetchSize', value);
  },
};

/**
 * Converts string settings (from a properties file or the environment) into
 * configuration options. Keys are case sensitive; missing values are skipped.
 */
export const parseSettings = (settings: Readonly<Record<string, string | undefined>>): ConfigurationOptions => {
  const options: ConfigurationOptions = {};
  for (const [name, value] of Object.entries(settings)) {
    const parser = Object.prototype.hasOwnProperty.call(SETTINGS, name) ? SETTINGS[name] : undefined;
    if (!parser) {
      throw new ConfigurationError(
        `The setting ${name} is not known. Make sure you spelled it correctly (case sensitive).`,
        { details: { setting: name } }
      );
    }
    if (value !== undefined) {
      parser(value, options);
    }
  }
  return options;
};

const toCamelCase = (name: string): string =>
  name.toLowerCase().replace(/_([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase());

/**
 * Collects settings from variables such as `QUARRY_LOCAL_CACHE_SCOPE`.
 */
export const settingsFromEnv = (
  env: Readonly<Record<string, string | undefined>> = process.env,
  prefix = 'QUARRY_'
): Record<string, string> => {
  const settings: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (name.startsWith(prefix) && name.length > prefix.length && value !== undefined) {
      settings[toCamelCase(name.slice(prefix.length))] = value;
    }
  }
  return settings;
};
