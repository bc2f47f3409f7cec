import { readFile } from 'fs/promises';
import {
  DEFAULT_CONFIG,
  PartialTranspilerConfig,
  PartialTranspilerConfigSchema,
  TranspilerConfig
} from '../types/config';

export interface ConfigError {
  path: string;
  error: unknown;
}

interface LoadConfigResult {
  config: TranspilerConfig;
  errors: ConfigError[];
}

async function loadConfigFile(configPath: string): Promise<PartialTranspilerConfig> {
  const content = await readFile(configPath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return PartialTranspilerConfigSchema.parse(parsed);
}

/**
 * Merges `override` over `base`, ignoring keys whose value is undefined
 */
export function mergeConfig(base: TranspilerConfig, override: PartialTranspilerConfig): TranspilerConfig {
  return {
    source: override.source ?? base.source,
    target: override.target ?? base.target,
    format: override.format ?? base.format,
    score: override.score ?? base.score,
    failOn: override.failOn ?? base.failOn,
    json: override.json ?? base.json,
    logLevel: override.logLevel ?? base.logLevel
  };
}

/**
 * Load and merge configuration
 * Priority: CLI options > config file > defaults
 */
export async function loadConfig(
  configPath: string | undefined,
  cliOptions: PartialTranspilerConfig = {}
): Promise<LoadConfigResult> {
  let config = DEFAULT_CONFIG;
  const errors: ConfigError[] = [];

  if (configPath) {
    try {
      config = mergeConfig(config, await loadConfigFile(configPath));
    } catch (error) {
      errors.push({ path: configPath, error });
    }
  }

  return { config: mergeConfig(config, cliOptions), errors };
}
