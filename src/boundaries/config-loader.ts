import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';

enum ConfigKey {
  BUDGET = 'Budget',
  RELEVANCE_THRESHOLD = 'RelevanceThreshold',
  MAX_EVIDENCE = 'MaxEvidence',
  QUERIES_PER_CLAIM = 'QueriesPerClaim',
  CONCURRENCY = 'Concurrency',
  MAX_CLAIMS = 'MaxClaims',
  MAX_QUESTIONS = 'MaxQuestions',
  SEARCH_PAUSE_MS = 'SearchPauseMs',
  SEARCH_RETRIES = 'SearchRetries',
  SEARCH_BACKOFF_MS = 'SearchBackoffMs',
  SEARCH_TIMEOUT_MS = 'SearchTimeoutMs',
  MAX_SEARCH_RESULTS = 'MaxSearchResults',
}

type NumericField = Exclude<keyof Config, 'investor' | 'configPath'>;

const NUMERIC_KEYS: Record<ConfigKey, NumericField> = {
  [ConfigKey.BUDGET]: 'budget',
  [ConfigKey.RELEVANCE_THRESHOLD]: 'relevanceThreshold',
  [ConfigKey.MAX_EVIDENCE]: 'maxEvidence',
  [ConfigKey.QUERIES_PER_CLAIM]: 'queriesPerClaim',
  [ConfigKey.CONCURRENCY]: 'concurrency',
  [ConfigKey.MAX_CLAIMS]: 'maxClaims',
  [ConfigKey.MAX_QUESTIONS]: 'maxQuestions',
  [ConfigKey.SEARCH_PAUSE_MS]: 'searchPauseMs',
  [ConfigKey.SEARCH_RETRIES]: 'searchRetries',
  [ConfigKey.SEARCH_BACKOFF_MS]: 'searchBackoffMs',
  [ConfigKey.SEARCH_TIMEOUT_MS]: 'searchTimeoutMs',
  [ConfigKey.MAX_SEARCH_RESULTS]: 'maxSearchResults',
};

function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(NUMERIC_KEYS, key);
}

const stripQuotes = (str: string): string =>
  str.trim().replace(/^"|"$/g, '').replace(/^'|'$/g, '');

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => stripQuotes(s))
    .filter((s) => s.length > 0);
}

interface RawConfig {
  numbers: Partial<Record<NumericField, number>>;
  investor: { name?: string; focusAreas?: string[]; stage?: string };
}

function parseIni(raw: string): RawConfig {
  const result: RawConfig = { numbers: {}, investor: {} };
  let currentSection: string | null = null;

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    const sectionMatch = line.match(/^\[(.*)\]$/);
    if (sectionMatch && sectionMatch[1] !== undefined) {
      currentSection = sectionMatch[1].trim().toLowerCase();
      continue;
    }

    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) continue;
    const key = m[1];
    const val = stripQuotes(m[2] ?? '');

    if (currentSection === 'investor') {
      switch (key) {
        case 'Name':
          result.investor.name = val;
          break;
        case 'FocusAreas':
          result.investor.focusAreas = splitList(val);
          break;
        case 'Stage':
          result.investor.stage = val;
          break;
        default:
          throw new ConfigError(`Unknown key in [investor] section: ${key}`);
      }
      continue;
    }
    if (currentSection !== null) {
      throw new ConfigError(`Unknown config section: [${currentSection}]`);
    }
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown config key: ${key}`);
    }
    const parsed = Number(val);
    if (!val || Number.isNaN(parsed)) {
      throw new ConfigError(`Invalid ${key} value: ${val}`);
    }
    result.numbers[NUMERIC_KEYS[key]] = parsed;
  }

  return result;
}

/**
 * Load and validate configuration from .deckproof.ini.
 *
 * The default file is optional; when absent every setting takes its
 * default. An explicit `configPath` must exist.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Readonly<Config> {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  let rawConfig: RawConfig = { numbers: {}, investor: {} };
  let loadedFrom: string | undefined;

  if (existsSync(iniPath)) {
    try {
      rawConfig = parseIni(readFileSync(iniPath, 'utf-8'));
      loadedFrom = iniPath;
    } catch (e: unknown) {
      if (e instanceof ConfigError) throw e;
      const err = handleUnknownError(e, 'Reading config file');
      throw new ConfigError(`Failed to read config file: ${err.message}`);
    }
  } else if (configPath) {
    throw new ConfigError(`Missing configuration file at ${iniPath}`);
  }

  const configData = {
    ...rawConfig.numbers,
    investor: rawConfig.investor,
    ...(loadedFrom !== undefined && { configPath: loadedFrom }),
  };

  try {
    return Object.freeze(CONFIG_SCHEMA.parse(configData));
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const details = e.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new ValidationError(`Invalid configuration: ${details}`, e);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
