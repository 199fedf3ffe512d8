/**
 * Configuration loader for the Tagcrate playlist builder
 *
 * Supports (in order of precedence):
 * 1. Environment variables (TAGCRATE_*)
 * 2. Config file (tagcrate.yml, tagcrate.yaml or tagcrate.json)
 * 3. Default values
 */

import * as fs from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import { ConfigurationError } from './errors';
import { isLogLevel, log, type LogLevel } from './services/log-service';
import {
  DEFAULT_COMPLEX_TRACK_OPTIONS,
  PLAYLIST_FILTER_NAMES,
  type PlaylistFilterSettings
} from './tree/playlist-filters';
import { isRecord, isStringArray } from './utils/guards';

export interface BuilderConfig {
  collection: {
    path: string;
    /** Empty means "auto_<collection file name>" beside the collection */
    output: string;
  };
  playlists: {
    config: string;
    /** "folder", "playlist" or empty to skip remainder bucketing */
    remainder: string;
    pureGenrePlaylists: string[];
    genreDelimiter: string;
    filters: PlaylistFilterSettings;
    printStatistics: boolean;
  };
  logging: {
    level: LogLevel;
  };
}

export type PartialFilterSettings = {
  [K in keyof PlaylistFilterSettings]?: Partial<PlaylistFilterSettings[K]>;
};

export interface PartialBuilderConfig {
  collection?: Partial<BuilderConfig['collection']>;
  playlists?: Partial<Omit<BuilderConfig['playlists'], 'filters'>> & {
    filters?: PartialFilterSettings;
  };
  logging?: Partial<BuilderConfig['logging']>;
}

const DEFAULT_CONFIG: BuilderConfig = {
  collection: {
    path: './collection.json',
    output: ''
  },
  playlists: {
    config: './playlists.yml',
    remainder: 'folder',
    pureGenrePlaylists: [],
    genreDelimiter: '/',
    filters: {
      hipHop: { enabled: true, playlist: 'Hip Hop', pureParent: 'Genres' },
      minimalDeepTech: { enabled: false, playlist: 'Minimal Deep Tech' },
      complexTrack: { enabled: false, ...DEFAULT_COMPLEX_TRACK_OPTIONS },
      transitionTrack: { enabled: false, separator: '/' }
    },
    printStatistics: false
  },
  logging: {
    level: 'info'
  }
};

const CONFIG_FILE_NAMES = ['tagcrate.yml', 'tagcrate.yaml', 'tagcrate.json'];

/**
 * Load configuration from environment variables
 */
export function loadFromEnv(env: NodeJS.ProcessEnv = process.env): PartialBuilderConfig {
  const config: PartialBuilderConfig = {};

  // Collection
  if (env.TAGCRATE_COLLECTION) {
    config.collection = { ...config.collection, path: env.TAGCRATE_COLLECTION };
  }
  if (env.TAGCRATE_OUTPUT) {
    config.collection = { ...config.collection, output: env.TAGCRATE_OUTPUT };
  }

  // Playlists
  if (env.TAGCRATE_PLAYLIST_CONFIG) {
    config.playlists = { ...config.playlists, config: env.TAGCRATE_PLAYLIST_CONFIG };
  }
  if (env.TAGCRATE_REMAINDER !== undefined) {
    config.playlists = { ...config.playlists, remainder: env.TAGCRATE_REMAINDER };
  }
  if (env.TAGCRATE_PURE_GENRES) {
    config.playlists = {
      ...config.playlists,
      pureGenrePlaylists: env.TAGCRATE_PURE_GENRES.split(',').map(g => g.trim()).filter(Boolean)
    };
  }
  if (env.TAGCRATE_PLAYLIST_FILTERS !== undefined) {
    config.playlists = {
      ...config.playlists,
      filters: enabledFilters(env.TAGCRATE_PLAYLIST_FILTERS)
    };
  }

  // Logging
  if (env.TAGCRATE_LOG_LEVEL) {
    if (!isLogLevel(env.TAGCRATE_LOG_LEVEL)) {
      throw new ConfigurationError(`Invalid log level "${env.TAGCRATE_LOG_LEVEL}"`, 'TAGCRATE_LOG_LEVEL');
    }
    config.logging = { level: env.TAGCRATE_LOG_LEVEL };
  }

  return config;
}

/**
 * Comma separated filter class names; filters not listed are disabled
 */
function enabledFilters(value: string): PartialFilterSettings {
  const names = value.split(',').map(name => name.trim()).filter(Boolean);
  for (const name of names) {
    if (!PLAYLIST_FILTER_NAMES.some(([filterName]) => filterName === name)) {
      throw new ConfigurationError(`Unknown playlist filter "${name}"`, 'TAGCRATE_PLAYLIST_FILTERS');
    }
  }

  const filters: PartialFilterSettings = {};
  for (const [filterName, key] of PLAYLIST_FILTER_NAMES) {
    filters[key] = { enabled: names.includes(filterName) };
  }
  return filters;
}

function readString(section: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`"${key}" must be a string`, source);
  }
  return value;
}

function readBoolean(section: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`"${key}" must be true or false`, source);
  }
  return value;
}

function readCount(section: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`"${key}" must be a whole number`, source);
  }
  return value;
}

function readStringList(section: Record<string, unknown>, key: string, source: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (!isStringArray(value)) {
    throw new ConfigurationError(`"${key}" must be a list of strings`, source);
  }
  return value;
}

function readSection(raw: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigurationError(`"${key}" must be a mapping`, source);
  }
  return value;
}

// Unset keys must stay absent so they do not override defaults when merged
function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value;
}

/**
 * Validate the parsed contents of a config file
 */
export function parseConfigFile(raw: unknown, source: string): PartialBuilderConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigurationError('Config file must contain a mapping', source);
  }

  const collection = readSection(raw, 'collection', source);
  const playlists = readSection(raw, 'playlists', source);
  const filters = readSection(playlists, 'filters', source);
  const logging = readSection(raw, 'logging', source);

  let level: LogLevel | undefined;
  const levelName = readString(logging, 'level', source);
  if (levelName !== undefined) {
    if (!isLogLevel(levelName)) {
      throw new ConfigurationError(`Invalid log level "${levelName}"`, source);
    }
    level = levelName;
  }

  const config: Required<PartialBuilderConfig> = {
    collection: {},
    playlists: {},
    logging: {}
  };

  setIfDefined(config.collection, 'path', readString(collection, 'path', source));
  setIfDefined(config.collection, 'output', readString(collection, 'output', source));

  setIfDefined(config.playlists, 'config', readString(playlists, 'config', source));
  setIfDefined(config.playlists, 'remainder', readString(playlists, 'remainder', source));
  setIfDefined(config.playlists, 'pureGenrePlaylists', readStringList(playlists, 'pureGenrePlaylists', source));
  setIfDefined(config.playlists, 'genreDelimiter', readString(playlists, 'genreDelimiter', source));
  setIfDefined(config.playlists, 'printStatistics', readBoolean(playlists, 'printStatistics', source));

  config.playlists.filters = parseFilterSettings(filters, source);

  setIfDefined(config.logging, 'level', level);

  return config;
}

function parseFilterSettings(raw: Record<string, unknown>, source: string): PartialFilterSettings {
  const hipHop = readSection(raw, 'hipHop', source);
  const minimalDeepTech = readSection(raw, 'minimalDeepTech', source);
  const complexTrack = readSection(raw, 'complexTrack', source);
  const transitionTrack = readSection(raw, 'transitionTrack', source);

  const settings: Required<PartialFilterSettings> = {
    hipHop: {},
    minimalDeepTech: {},
    complexTrack: {},
    transitionTrack: {}
  };

  setIfDefined(settings.hipHop, 'enabled', readBoolean(hipHop, 'enabled', source));
  setIfDefined(settings.hipHop, 'playlist', readString(hipHop, 'playlist', source));
  setIfDefined(settings.hipHop, 'pureParent', readString(hipHop, 'pureParent', source));

  setIfDefined(settings.minimalDeepTech, 'enabled', readBoolean(minimalDeepTech, 'enabled', source));
  setIfDefined(settings.minimalDeepTech, 'playlist', readString(minimalDeepTech, 'playlist', source));

  setIfDefined(settings.complexTrack, 'enabled', readBoolean(complexTrack, 'enabled', source));
  setIfDefined(settings.complexTrack, 'minTags', readCount(complexTrack, 'minTags', source));
  setIfDefined(settings.complexTrack, 'excludeTags', readStringList(complexTrack, 'excludeTags', source));

  setIfDefined(settings.transitionTrack, 'enabled', readBoolean(transitionTrack, 'enabled', source));
  setIfDefined(settings.transitionTrack, 'separator', readString(transitionTrack, 'separator', source));

  return settings;
}

/**
 * Load configuration from file
 */
function loadFromFile(configPath: string | undefined, basePath: string): PartialBuilderConfig {
  const searchPaths = configPath
    ? [configPath]
    : CONFIG_FILE_NAMES.map(name => path.join(basePath, name));

  for (const filePath of searchPaths) {
    if (fs.existsSync(filePath)) {
      log.info('Config', `Loading from: ${filePath}`);
      const content = fs.readFileSync(filePath, 'utf-8');

      let raw: unknown;
      try {
        raw = filePath.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
      } catch (error) {
        throw new ConfigurationError(
          `Could not parse config file: ${error instanceof Error ? error.message : String(error)}`,
          filePath
        );
      }
      return parseConfigFile(raw, filePath);
    }
  }

  if (configPath) {
    throw new ConfigurationError('Config file not found', configPath);
  }

  return {};
}

export function mergeConfig(base: BuilderConfig, override: PartialBuilderConfig): BuilderConfig {
  return {
    collection: { ...base.collection, ...override.collection },
    playlists: {
      ...base.playlists,
      ...override.playlists,
      filters: mergeFilters(base.playlists.filters, override.playlists?.filters)
    },
    logging: { ...base.logging, ...override.logging }
  };
}

function mergeFilters(base: PlaylistFilterSettings, override: PartialFilterSettings = {}): PlaylistFilterSettings {
  return {
    hipHop: { ...base.hipHop, ...override.hipHop },
    minimalDeepTech: { ...base.minimalDeepTech, ...override.minimalDeepTech },
    complexTrack: { ...base.complexTrack, ...override.complexTrack },
    transitionTrack: { ...base.transitionTrack, ...override.transitionTrack }
  };
}

/**
 * Resolve relative paths to absolute paths
 */
function resolvePaths(config: BuilderConfig, basePath: string): BuilderConfig {
  const resolve = (p: string) => (!p || path.isAbsolute(p)) ? p : path.resolve(basePath, p);

  return {
    ...config,
    collection: {
      path: resolve(config.collection.path),
      output: resolve(config.collection.output)
    },
    playlists: {
      ...config.playlists,
      config: resolve(config.playlists.config)
    }
  };
}

export interface LoadConfigOptions {
  configPath?: string;
  basePath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): BuilderConfig {
  const basePath = options.basePath || process.cwd();

  // Load from file first (lowest precedence after defaults)
  const fileConfig = loadFromFile(options.configPath, basePath);

  // Load from environment (highest precedence)
  const envConfig = loadFromEnv(options.env);

  // Merge: defaults <- file <- env
  let config = mergeConfig(DEFAULT_CONFIG, fileConfig);
  config = mergeConfig(config, envConfig);

  return resolvePaths(config, basePath);
}

/**
 * Generate example config file
 */
export function generateExampleConfig(): string {
  return YAML.stringify({
    collection: {
      path: './collection.json',
      output: ''
    },
    playlists: {
      config: './playlists.yml',
      remainder: 'folder',
      pureGenrePlaylists: ['Techno', 'House'],
      genreDelimiter: '/',
      filters: {
        hipHop: { enabled: true, playlist: 'Hip Hop', pureParent: 'Genres' },
        minimalDeepTech: { enabled: false, playlist: 'Minimal Deep Tech' },
        complexTrack: { enabled: false, minTags: 3, excludeTags: ['Vocal', 'Piano'] },
        transitionTrack: { enabled: false, separator: '/' }
      },
      printStatistics: false
    },
    logging: {
      level: 'info'
    }
  });
}
