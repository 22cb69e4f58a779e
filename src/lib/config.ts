/**
 * Configuration System for hn-narrator
 *
 * Provides centralized, type-safe configuration with:
 * - YAML file-based configuration (config.yaml)
 * - Environment-specific overrides (config.{env}.yaml)
 * - Environment variable overrides
 * - CLI overrides (highest priority, applied by the caller)
 *
 * The result is a plain value built once at startup and handed to each
 * component; nothing here is cached at module level.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import YAML from 'yaml';
import { ConfigError } from './errors.js';

// ============ Configuration Schema ============

const PathsConfigSchema = z.object({
  /** Directory receiving metadata, audio and run.json */
  output: z.string().default('./output'),
});

const HackerNewsConfigSchema = z.object({
  /** Front page, also the base for relative story links */
  baseUrl: z.string().url().default('https://news.ycombinator.com'),
  /** The front page serves reduced markup to unknown agents */
  userAgent: z
    .string()
    .default(
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/132.0.0.0 Safari/537.36'
    ),
  timeout: z.number().int().positive().default(30000),
});

const ExtractionConfigSchema = z.object({
  /** Reader proxy; the target URL is appended to it */
  baseUrl: z.string().url().default('https://r.jina.ai'),
  apiKey: z.string().optional(),
  /** Article text budget in characters */
  maxChars: z.number().int().positive().default(4000),
  maxComments: z.number().int().nonnegative().default(10),
  timeout: z.number().int().positive().default(30000),
});

const CompletionConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  apiKey: z.string().optional(),
  model: z.string().default('DeepSeek-V3'),
  maxTokens: z.number().int().positive().default(1000),
  temperature: z.number().min(0).max(2).default(0.7),
  timeout: z.number().int().positive().default(60000),
});

const VoiceSchema = z.object({
  /** xml:lang of the SSML document, e.g. en-US */
  locale: z.string().min(1),
  /** Neural voice name, e.g. en-US-AndrewMultilingualNeural */
  voice: z.string().min(1),
});

const SpeechConfigSchema = z.object({
  key: z.string().optional(),
  region: z.string().optional(),
  /** 16-bit PCM in a RIFF (WAV) container */
  outputFormat: z.string().default('riff-24khz-16bit-mono-pcm'),
  voices: z.record(z.string(), VoiceSchema).default({
    en: { locale: 'en-US', voice: 'en-US-AndrewMultilingualNeural' },
    zh: { locale: 'zh-CN', voice: 'zh-CN-XiaoxiaoNeural' },
  }),
  timeout: z.number().int().positive().default(30000),
});

const LanguagesConfigSchema = z.object({
  primary: z.string().default('en'),
  secondary: z.string().default('zh'),
});

const PipelineConfigSchema = z.object({
  /** Number of front-page stories to process */
  topN: z.number().int().positive().default(10),
  /** Stories processed at the same time */
  concurrency: z.number().int().positive().default(1),
  /** Repeat the run on this cron schedule */
  cron: z.string().optional(),
});

const LoggingConfigSchema = z.object({
  /** Log level: debug, info, warn, error */
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Include timestamps in logs */
  timestamps: z.boolean().default(true),
  /** Use colors in console output */
  colors: z.boolean().default(true),
});

const ConfigSchema = z
  .object({
    /** Environment name */
    env: z.enum(['development', 'staging', 'production']).default('development'),
    paths: PathsConfigSchema.default({}),
    hackerNews: HackerNewsConfigSchema.default({}),
    extraction: ExtractionConfigSchema.default({}),
    completion: CompletionConfigSchema.default({}),
    speech: SpeechConfigSchema.default({}),
    languages: LanguagesConfigSchema.default({}),
    pipeline: PipelineConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .refine((c) => c.languages.primary !== c.languages.secondary, {
    message: 'Primary and secondary languages must differ',
    path: ['languages'],
  });

export type Config = z.infer<typeof ConfigSchema>;
export type HackerNewsConfig = z.infer<typeof HackerNewsConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type CompletionConfig = z.infer<typeof CompletionConfigSchema>;
export type SpeechConfig = z.infer<typeof SpeechConfigSchema>;
export type VoiceConfig = z.infer<typeof VoiceSchema>;
export type LanguagesConfig = z.infer<typeof LanguagesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/** Plain nested object, as read from YAML or built from env/CLI */
export type ConfigLayer = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Where to start looking for the project root (default: process.cwd()) */
  cwd?: string;
  /** Environment variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Applied last, e.g. from CLI flags */
  overrides?: ConfigLayer;
}

// ============ Configuration Loading ============

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Find the project root by looking for package.json
 */
function findProjectRoot(start: string): string {
  let dir = start;
  while (true) {
    if (existsSync(join(dir, 'package.json'))) {
      return dir;
    }
    const parent = join(dir, '..');
    if (parent === dir) break;
    dir = parent;
  }
  return start;
}

/**
 * Load and parse a YAML config file
 */
function loadYamlFile(filePath: string): ConfigLayer | null {
  if (!existsSync(filePath)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Could not parse ${filePath}`, ['top level must be a mapping']);
  }
  return parsed;
}

/**
 * Deep merge two objects
 */
export function deepMerge(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function setPath(config: ConfigLayer, path: string[], value: unknown): void {
  let current = config;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: ConfigLayer = {};
      current[key] = created;
      current = created;
    }
  }
  current[path[path.length - 1]] = value;
}

const toInt = (v: string): number => Number.parseInt(v, 10);

/**
 * Environment variable → config path mappings
 */
const ENV_MAPPINGS: Array<[string, string[], (v: string) => unknown]> = [
  // Environment
  ['NODE_ENV', ['env'], (v) => (v === 'production' ? 'production' : v === 'staging' ? 'staging' : 'development')],
  ['NARRATOR_ENV', ['env'], (v) => v],

  // Services
  ['JINA_KEY', ['extraction', 'apiKey'], (v) => v],
  ['OPENAI_BASE', ['completion', 'baseUrl'], (v) => v],
  ['OPENAI_MODEL', ['completion', 'model'], (v) => v],
  ['OPENAI_API_KEY', ['completion', 'apiKey'], (v) => v],
  ['AZURE_SPEECH_KEY', ['speech', 'key'], (v) => v],
  ['AZURE_SPEECH_REGION', ['speech', 'region'], (v) => v],

  // Run
  ['OUTPUT_DIR', ['paths', 'output'], (v) => v],
  ['TOP_N', ['pipeline', 'topN'], toInt],
  ['PIPELINE_CONCURRENCY', ['pipeline', 'concurrency'], toInt],
  ['PIPELINE_CRON', ['pipeline', 'cron'], (v) => v],

  // Logging
  ['LOG_LEVEL', ['logging', 'level'], (v) => v],
  ['NO_COLOR', ['logging', 'colors'], () => false],
];

/**
 * Apply environment variable overrides. Empty values are ignored.
 */
function applyEnvOverrides(config: ConfigLayer, env: NodeJS.ProcessEnv): ConfigLayer {
  const result = deepMerge({}, config);
  for (const [envKey, path, transform] of ENV_MAPPINGS) {
    const envValue = env[envKey];
    if (envValue !== undefined && envValue !== '') {
      setPath(result, path, transform(envValue));
    }
  }
  return result;
}

/**
 * Load configuration with proper layering
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const projectRoot = findProjectRoot(options.cwd ?? process.cwd());

  // 1. Start with empty config (defaults come from schema)
  let config: ConfigLayer = {};

  // 2. Load base config.yaml
  const baseConfig = loadYamlFile(join(projectRoot, 'config.yaml'));
  if (baseConfig) {
    config = deepMerge(config, baseConfig);
  }

  // 3. Load environment-specific config
  const envName = env.NARRATOR_ENV || env.NODE_ENV || 'development';
  const envShort = envName === 'production' ? 'prod' : envName === 'staging' ? 'staging' : 'dev';
  const envConfig = loadYamlFile(join(projectRoot, `config.${envShort}.yaml`));
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  // 4. Environment variables, then caller overrides
  config = applyEnvOverrides(config, env);
  if (options.overrides) {
    config = deepMerge(config, options.overrides);
  }

  // 5. Validate and apply defaults
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => {
      const path = issue.path.join('.');
      return `${path ? `${path}: ` : ''}${issue.message}`;
    });
    throw new ConfigError('Invalid configuration', issues);
  }

  return result.data;
}

/**
 * Settings a run cannot do without, with the variable that supplies each
 */
const REQUIRED_SETTINGS: Array<[string, (c: Config) => string | undefined]> = [
  ['JINA_KEY', (c) => c.extraction.apiKey],
  ['OPENAI_BASE', (c) => c.completion.baseUrl],
  ['OPENAI_API_KEY', (c) => c.completion.apiKey],
  ['AZURE_SPEECH_KEY', (c) => c.speech.key],
  ['AZURE_SPEECH_REGION', (c) => c.speech.region],
];

/**
 * Throw a ConfigError naming every missing service setting
 */
export function requireSettings(config: Config): void {
  const missing = REQUIRED_SETTINGS.filter(([, read]) => !read(config)).map(([name]) => `${name} is not set`);
  if (missing.length > 0) {
    throw new ConfigError('Missing required settings', missing);
  }
}

/**
 * Languages narrated per story, primary first
 */
export function getLanguages(config: Config): [string, string] {
  return [config.languages.primary, config.languages.secondary];
}
