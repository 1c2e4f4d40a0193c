import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config, type OutputFormat } from './schema.js';
import { ConfigError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('config');

export const CONFIG_SEARCH_PATHS = [
  './config/local.yaml',
  './config/default.yaml',
  './topic-scout.yaml',
  './topic-scout.yml',
] as const;

/** Replaces `${NAME}` with the environment value, or an empty string when unset. */
export function expandEnvVariables(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(expandEnvVariables);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = expandEnvVariables(val);
    }
    return result;
  }
  return value;
}

export function parseConfig(data: unknown): Config {
  const result = ConfigSchema.safeParse(expandEnvVariables(data ?? {}));

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

export async function loadConfig(configPath?: string): Promise<Config> {
  const paths = configPath ? [configPath] : CONFIG_SEARCH_PATHS;

  if (configPath && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let configData: unknown = {};

  for (const path of paths) {
    if (existsSync(path)) {
      try {
        const content = await readFile(path, 'utf-8');
        configData = parseYaml(content);
      } catch (error) {
        throw new ConfigError(`Failed to parse config file: ${path}`, { cause: error });
      }
      logger.debug({ path }, 'Config file loaded');
      break;
    }
  }

  return parseConfig(configData);
}

export interface CLIOverrides {
  limit: number;
  daysBack: number;
  output: string;
  format: OutputFormat;
}

export function mergeConfigWithCLI(config: Config, cliOptions: Partial<CLIOverrides>): Config {
  const merged = { ...config };

  if (cliOptions.limit !== undefined) {
    merged.search = { ...merged.search, defaultLimit: cliOptions.limit };
  }

  if (cliOptions.daysBack !== undefined) {
    merged.search = { ...merged.search, defaultDaysBack: cliOptions.daysBack };
  }

  if (cliOptions.output !== undefined) {
    merged.output = { ...merged.output, directory: cliOptions.output };
  }

  if (cliOptions.format !== undefined) {
    merged.output = { ...merged.output, format: cliOptions.format };
  }

  return merged;
}
