import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { NotificationLevel } from '../notifications/notification-level.js';
import type { Notifier } from '../notifications/notifier.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { type Config, collectConfigWarnings, type RawConfig, validateConfigSafe } from './config-schema.js';

/**
 * Default config file path
 */
export const DEFAULT_CONFIG_PATH = './podsed.yaml';

/**
 * Load, resolve and validate the YAML configuration file
 *
 * `${VAR}` references are resolved before validation, so they may stand in
 * for any string value, URLs included. Misplaced settings are reported to
 * `notifier` as warnings.
 *
 * @throws ConfigError if the file is missing, not YAML, references an unset
 * variable or fails validation
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, notifier?: Notifier): Promise<Config> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(
        `Configuration file not found: "${absolutePath}". Create a podsed.yaml file or specify a different path.`,
      );
    }
    throw new ConfigError(`Failed to read configuration "${absolutePath}": ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  const rawConfig = resolveEnvRecursive(parsed);
  if (!isRawConfig(rawConfig)) {
    throw new ConfigError(`Configuration "${absolutePath}" must be a YAML mapping`);
  }

  for (const warning of collectConfigWarnings(rawConfig)) {
    notifier?.notify(NotificationLevel.WARNING, `Configuration: ${warning}`);
  }

  const result = validateConfigSafe(rawConfig);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in "${absolutePath}": ${result.error}`);
  }

  return result.config;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
