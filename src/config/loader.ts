/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Explicit overrides (passed directly)
 * 2. Environment variables (RAGLINE_*)
 * 3. Project config file (./ragline.config.json)
 * 4. User config file (~/.ragline/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_CONFIG, resolvePath, type RagConfig } from './rag-config.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** Config file structure: every section and field is optional. */
export type ExternalConfig = {
  [Section in keyof RagConfig]?: Partial<RagConfig[Section]>;
};

type SectionName = keyof RagConfig;

/** One config layer before field types are checked. */
export type RawConfig = Partial<Record<SectionName, Record<string, unknown>>>;

const SECTION_NAMES: readonly SectionName[] = [
  'chunking',
  'embedding',
  'retrieval',
  'rerank',
  'memory',
  'context',
  'generation',
  'storage',
];

type EnvBinding = {
  [Section in SectionName]: {
    env: string;
    section: Section;
    key: keyof RagConfig[Section] & string;
  };
}[SectionName];

/**
 * Environment variables, `RAGLINE_<SECTION>_<FIELD>`.
 */
const ENV_BINDINGS: EnvBinding[] = [
  { env: 'RAGLINE_CHUNKING_CHUNK_SIZE', section: 'chunking', key: 'chunkSize' },
  { env: 'RAGLINE_CHUNKING_OVERLAP', section: 'chunking', key: 'overlap' },
  { env: 'RAGLINE_EMBEDDING_BASE_URL', section: 'embedding', key: 'baseUrl' },
  { env: 'RAGLINE_EMBEDDING_MODEL', section: 'embedding', key: 'model' },
  { env: 'RAGLINE_EMBEDDING_DIMENSIONS', section: 'embedding', key: 'dimensions' },
  { env: 'RAGLINE_EMBEDDING_BATCH_SIZE', section: 'embedding', key: 'batchSize' },
  { env: 'RAGLINE_EMBEDDING_CONCURRENCY', section: 'embedding', key: 'concurrency' },
  { env: 'RAGLINE_EMBEDDING_MAX_RETRIES', section: 'embedding', key: 'maxRetries' },
  { env: 'RAGLINE_EMBEDDING_BASE_DELAY_MS', section: 'embedding', key: 'baseDelayMs' },
  { env: 'RAGLINE_EMBEDDING_TIMEOUT_MS', section: 'embedding', key: 'timeoutMs' },
  { env: 'RAGLINE_RETRIEVAL_TOP_K', section: 'retrieval', key: 'topK' },
  { env: 'RAGLINE_RETRIEVAL_VECTOR_WEIGHT', section: 'retrieval', key: 'vectorWeight' },
  { env: 'RAGLINE_RETRIEVAL_LEXICAL_WEIGHT', section: 'retrieval', key: 'lexicalWeight' },
  { env: 'RAGLINE_RERANK_TOP_K', section: 'rerank', key: 'topK' },
  { env: 'RAGLINE_RERANK_FINAL_TOP_K', section: 'rerank', key: 'finalTopK' },
  { env: 'RAGLINE_RERANK_MODEL', section: 'rerank', key: 'model' },
  { env: 'RAGLINE_MEMORY_MAX_MESSAGES', section: 'memory', key: 'maxMessages' },
  { env: 'RAGLINE_MEMORY_MAX_TOKENS', section: 'memory', key: 'maxTokens' },
  { env: 'RAGLINE_CONTEXT_MAX_TOKENS', section: 'context', key: 'maxTokens' },
  { env: 'RAGLINE_STORAGE_DB_PATH', section: 'storage', key: 'dbPath' },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSectionName(name: string): name is SectionName {
  return SECTION_NAMES.some((section) => section === name);
}

function defaultValue(section: SectionName, key: string): unknown {
  return Object.entries(DEFAULT_CONFIG[section]).find(([name]) => name === key)?.[1];
}

/**
 * Load config from a JSON file. Missing files yield null; unreadable ones throw.
 */
function loadConfigFile(path: string): RawConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${path}`, 'CONFIG_PARSE_FAILED', error);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`, 'CONFIG_PARSE_FAILED');
  }

  log.debug(`Loaded config file ${resolvedPath}`);
  return toRawConfig(parsed, path);
}

/**
 * Keep the known sections and fields of a parsed JSON object.
 */
function toRawConfig(raw: Record<string, unknown>, origin: string): RawConfig {
  const config: RawConfig = {};
  for (const [section, value] of Object.entries(raw)) {
    if (!isSectionName(section)) {
      log.warn(`Ignoring unknown config section "${section}"`, { origin });
      continue;
    }
    if (!isRecord(value)) {
      throw new ConfigError(`Config section "${section}" in ${origin} must be an object`, 'CONFIG_INVALID');
    }
    const fields: Record<string, unknown> = {};
    for (const [key, fieldValue] of Object.entries(value)) {
      if (defaultValue(section, key) === undefined) {
        log.warn(`Ignoring unknown config field "${section}.${key}"`, { origin });
        continue;
      }
      fields[key] = fieldValue;
    }
    config[section] = fields;
  }
  return config;
}

/**
 * Load config from environment variables.
 * Numeric fields are parsed as numbers; a value that is not a number is an error.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const config: RawConfig = {};

  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.env];
    if (raw === undefined || raw === '') continue;

    let value: string | number = raw;
    if (typeof defaultValue(binding.section, binding.key) === 'number') {
      value = Number(raw);
      if (Number.isNaN(value)) {
        throw new ConfigError(`${binding.env} must be a number, got "${raw}"`, 'CONFIG_INVALID');
      }
    }

    config[binding.section] = { ...config[binding.section], [binding.key]: value };
  }

  return config;
}

/**
 * Merge two configs section by section, with source overriding target.
 */
function mergeConfig(target: RawConfig, source: RawConfig | ExternalConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const section of SECTION_NAMES) {
    const values = source[section];
    if (values === undefined) continue;
    result[section] = { ...result[section], ...values };
  }

  return result;
}

function fieldReader<S extends SectionName>(section: S, raw: RawConfig) {
  const values: Record<string, unknown> = raw[section] ?? {};
  return {
    number(key: keyof RagConfig[S] & string, fallback: number): number {
      const value = values[key];
      if (value === undefined) return fallback;
      if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new ConfigError(`${section}.${key} must be a number`, 'CONFIG_INVALID');
      }
      return value;
    },
    string(key: keyof RagConfig[S] & string, fallback: string): string {
      const value = values[key];
      if (value === undefined) return fallback;
      if (typeof value !== 'string') {
        throw new ConfigError(`${section}.${key} must be a string`, 'CONFIG_INVALID');
      }
      return value;
    },
  };
}

/**
 * Fill every section from defaults, checking the type of each supplied field.
 *
 * @throws ConfigError when a field has the wrong type
 */
export function toRuntimeConfig(external: RawConfig | ExternalConfig): RagConfig {
  const raw = mergeConfig({}, external);
  const d = DEFAULT_CONFIG;
  const chunking = fieldReader('chunking', raw);
  const embedding = fieldReader('embedding', raw);
  const retrieval = fieldReader('retrieval', raw);
  const rerank = fieldReader('rerank', raw);
  const memory = fieldReader('memory', raw);
  const context = fieldReader('context', raw);
  const generation = fieldReader('generation', raw);
  const storage = fieldReader('storage', raw);

  return {
    chunking: {
      chunkSize: chunking.number('chunkSize', d.chunking.chunkSize),
      overlap: chunking.number('overlap', d.chunking.overlap),
    },
    embedding: {
      baseUrl: embedding.string('baseUrl', d.embedding.baseUrl),
      model: embedding.string('model', d.embedding.model),
      dimensions: embedding.number('dimensions', d.embedding.dimensions),
      batchSize: embedding.number('batchSize', d.embedding.batchSize),
      concurrency: embedding.number('concurrency', d.embedding.concurrency),
      maxRetries: embedding.number('maxRetries', d.embedding.maxRetries),
      baseDelayMs: embedding.number('baseDelayMs', d.embedding.baseDelayMs),
      maxDelayMs: embedding.number('maxDelayMs', d.embedding.maxDelayMs),
      timeoutMs: embedding.number('timeoutMs', d.embedding.timeoutMs),
      progressEvery: embedding.number('progressEvery', d.embedding.progressEvery),
    },
    retrieval: {
      topK: retrieval.number('topK', d.retrieval.topK),
      vectorWeight: retrieval.number('vectorWeight', d.retrieval.vectorWeight),
      lexicalWeight: retrieval.number('lexicalWeight', d.retrieval.lexicalWeight),
      timeoutMs: retrieval.number('timeoutMs', d.retrieval.timeoutMs),
    },
    rerank: {
      topK: rerank.number('topK', d.rerank.topK),
      finalTopK: rerank.number('finalTopK', d.rerank.finalTopK),
      model: rerank.string('model', d.rerank.model),
      timeoutMs: rerank.number('timeoutMs', d.rerank.timeoutMs),
      concurrency: rerank.number('concurrency', d.rerank.concurrency),
    },
    memory: {
      maxMessages: memory.number('maxMessages', d.memory.maxMessages),
      maxTokens: memory.number('maxTokens', d.memory.maxTokens),
    },
    context: {
      maxTokens: context.number('maxTokens', d.context.maxTokens),
    },
    generation: {
      timeoutMs: generation.number('timeoutMs', d.generation.timeoutMs),
    },
    storage: {
      dbPath: storage.string('dbPath', d.storage.dbPath),
    },
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate a complete configuration. Returns one message per problem.
 */
export function validateConfig(config: RagConfig): string[] {
  const errors: string[] = [];

  const positiveIntegers: Array<[string, number]> = [
    ['chunking.chunkSize', config.chunking.chunkSize],
    ['embedding.dimensions', config.embedding.dimensions],
    ['embedding.batchSize', config.embedding.batchSize],
    ['embedding.concurrency', config.embedding.concurrency],
    ['embedding.timeoutMs', config.embedding.timeoutMs],
    ['embedding.progressEvery', config.embedding.progressEvery],
    ['retrieval.topK', config.retrieval.topK],
    ['retrieval.timeoutMs', config.retrieval.timeoutMs],
    ['rerank.topK', config.rerank.topK],
    ['rerank.finalTopK', config.rerank.finalTopK],
    ['rerank.timeoutMs', config.rerank.timeoutMs],
    ['rerank.concurrency', config.rerank.concurrency],
    ['memory.maxMessages', config.memory.maxMessages],
    ['memory.maxTokens', config.memory.maxTokens],
    ['context.maxTokens', config.context.maxTokens],
    ['generation.timeoutMs', config.generation.timeoutMs],
  ];
  for (const [name, value] of positiveIntegers) {
    if (!isPositiveInteger(value)) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  if (!Number.isInteger(config.chunking.overlap) || config.chunking.overlap < 0) {
    errors.push('chunking.overlap must be a non-negative integer');
  } else if (config.chunking.overlap >= config.chunking.chunkSize) {
    errors.push('chunking.overlap must be smaller than chunking.chunkSize');
  }

  if (!Number.isInteger(config.embedding.maxRetries) || config.embedding.maxRetries < 0) {
    errors.push('embedding.maxRetries must be a non-negative integer');
  }
  if (!(config.embedding.baseDelayMs >= 0)) {
    errors.push('embedding.baseDelayMs must be >= 0');
  }
  if (config.embedding.maxDelayMs < config.embedding.baseDelayMs) {
    errors.push('embedding.maxDelayMs must be >= embedding.baseDelayMs');
  }

  if (!(config.retrieval.vectorWeight >= 0) || !(config.retrieval.lexicalWeight >= 0)) {
    errors.push('retrieval weights must be >= 0');
  }

  if (config.rerank.finalTopK > config.rerank.topK) {
    errors.push('rerank.finalTopK must not exceed rerank.topK');
  }

  if (!config.embedding.model.trim()) {
    errors.push('embedding.model must not be empty');
  }
  if (!config.storage.dbPath.trim()) {
    errors.push('storage.dbPath must not be empty');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Explicit overrides (highest priority) */
  overrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with priority-based resolution.
 *
 * @throws ConfigError when a file cannot be parsed or the result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): RagConfig {
  let config: RawConfig = {};

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.ragline/config.json');
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfigPath = options.projectConfigPath ?? join(process.cwd(), 'ragline.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig(options.env));
  }

  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  const runtime = toRuntimeConfig(config);
  const errors = validateConfig(runtime);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  return runtime;
}
