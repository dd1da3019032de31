import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getHarvestDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  api: z
    .object({
      key: z.string().default(''),
      base_url: z.string().default('https://www.googleapis.com/youtube/v3'),
      timeout_ms: z.number().int().positive().default(15000),
    })
    .default({}),

  rate_limit: z
    .object({
      capacity: z.number().int().positive().default(1),
      interval_ms: z.number().int().positive().default(1000),
    })
    .default({}),

  retry: z
    .object({
      initial_interval_ms: z.number().nonnegative().default(500),
      multiplier: z.number().min(1).default(1.5),
      randomization_factor: z.number().min(0).max(1).default(0.5),
      max_interval_ms: z.number().nonnegative().default(60000),
      // 0 disables the limit
      max_elapsed_ms: z.number().nonnegative().default(900000),
      max_attempts: z.number().int().nonnegative().default(0),
      fail_fast_on_input_error: z.boolean().default(false),
    })
    .default({}),

  output: z
    .object({
      dir: z.string().default('.'),
      file_prefix: z.string().min(1).default('comments'),
    })
    .default({}),

  fetch: z
    .object({
      default_max_results: z.number().int().positive().default(20),
      dedupe: z.boolean().default(false),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const SEARCH_PLACES = [
  'comment-harvest.config.yaml',
  'comment-harvest.config.yml',
  '.comment-harvestrc.yaml',
  '.comment-harvestrc.yml',
];

let cachedConfig: Config | null = null;
let cachedConfigPath: string | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export function getDefaultConfigPath(): string {
  return path.join(getHarvestDir(), 'config.yaml');
}

function toRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('comment-harvest', { searchPlaces: SEARCH_PLACES });

  const envConfigPath = process.env['HARVEST_CONFIG'];
  const defaultConfigPath = getDefaultConfigPath();

  let rawConfig: Record<string, unknown> = {};
  let configPath: string | null = null;

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = toRecord(result?.config);
    configPath = resolved;
  } else {
    const found = await explorer.search();
    if (found) {
      rawConfig = toRecord(found.config);
      configPath = found.filepath;
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = toRecord(result?.config);
      configPath = defaultConfigPath;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const envApiKey = process.env['HARVEST_API_KEY'];
  if (envApiKey) {
    rawConfig['api'] = { ...toRecord(rawConfig['api']), key: envApiKey };
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      path: configPath,
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  cachedConfigPath = configPath;
  return cachedConfig;
}

/** Path the cached config was read from, or null when only defaults apply. */
export function getLoadedConfigPath(): string | null {
  return cachedConfigPath;
}

export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/**
 * Persist config and update the in-memory cache. Writes back to the file the
 * config was loaded from, or ~/.comment-harvest/config.yaml when none was.
 */
export function saveConfig(config: Config, configPath = cachedConfigPath ?? getDefaultConfigPath()): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yamlStringify(config), 'utf-8');
  cachedConfig = config;
  cachedConfigPath = configPath;
}

export function redactConfig(config: Config): Config {
  return {
    ...config,
    api: { ...config.api, key: config.api.key ? '***REDACTED***' : '' },
  };
}
