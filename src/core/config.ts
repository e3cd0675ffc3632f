/**
 * Configuration loading
 *
 * Reads `access-lens.json`, applies defaults and validates it.
 */

import { fileExists, getConfigPath, readJson } from "../utils/index.js";
import { createLogger } from "../utils/logger.js";
import {
  AccessLensConfigSchema,
  formatZodError,
  safeValidate,
  type AccessLensConfig,
} from "../utils/validation.js";
import { ConfigurationError, ErrorCode } from "./errors.js";

const logger = createLogger("config");

/**
 * Configuration with every default applied.
 */
export function defaultConfig(): AccessLensConfig {
  return parseConfig({});
}

/**
 * Validate raw configuration data.
 *
 * @throws {ConfigurationError} If the data does not match the schema
 */
export function parseConfig(data: unknown, source?: string): AccessLensConfig {
  const validation = safeValidate(AccessLensConfigSchema, data);
  if (!validation.success) {
    throw new ConfigurationError("Invalid configuration", ErrorCode.CONFIG_INVALID, {
      source,
      issues: formatZodError(validation.error),
    });
  }
  return validation.data;
}

/**
 * Load configuration from `configPath`, or from the project root when no
 * path is given. A missing default file yields the defaults; a missing
 * explicit file is an error.
 *
 * @throws {ConfigurationError}
 */
export function loadConfig(configPath?: string): AccessLensConfig {
  const resolvedPath = configPath ?? getConfigPath();

  if (!fileExists(resolvedPath)) {
    if (configPath !== undefined) {
      throw new ConfigurationError("Configuration file not found", ErrorCode.CONFIG_NOT_FOUND, {
        source: resolvedPath,
      });
    }
    logger.debug({ configPath: resolvedPath }, "No configuration file, using defaults");
    return defaultConfig();
  }

  const data = readJson(resolvedPath);
  if (data === null) {
    throw new ConfigurationError("Configuration file is not valid JSON", ErrorCode.CONFIG_INVALID, {
      source: resolvedPath,
    });
  }

  logger.debug({ configPath: resolvedPath }, "Loaded configuration");
  return parseConfig(data, resolvedPath);
}
