/**
 * Configuration file loading
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { DockpackConfig } from "../types";
import { errorMessage } from "../utils/error";
import { DEFAULT_CONFIG, mergeConfig } from "./defaults";
import { buildInlineConfig, type InlineConfigOptions } from "./inline";
import { resolvePaths } from "./resolver";
import { ConfigError, parseConfigInput, validateConfig } from "./validator";

export {
  buildInlineConfig,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  mergeInlineConfig,
  type ParsedOptionValues,
} from "./inline";
export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "dockpack.config.yaml",
  "dockpack.config.yml",
  "dockpack.config.json",
];

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

function finalize(
  fileConfig: DockpackConfig,
  configDir: string,
  inline?: InlineConfigOptions,
): DockpackConfig {
  const merged = inline ? mergeConfig(fileConfig, buildInlineConfig(inline)) : fileConfig;
  validateConfig(merged);
  return resolvePaths(merged, configDir);
}

/**
 * Load and parse a config file
 */
export async function loadConfig(
  configPath: string,
  inline?: InlineConfigOptions,
): Promise<DockpackConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf-8");
  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  const merged = mergeConfig(DEFAULT_CONFIG, parseConfigInput(parsed));

  return finalize(merged, path.dirname(absolutePath), inline);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    try {
      if (statSync(configPath).isFile()) {
        return configPath;
      }
    } catch {
      // not present, try the next name
    }
  }

  return null;
}

/**
 * Find and load a config file. Without one the defaults apply, with
 * relative paths taken from the working directory.
 */
export async function findAndLoadConfig(
  configPath?: string,
  inline?: InlineConfigOptions,
): Promise<DockpackConfig> {
  if (configPath) {
    return loadConfig(configPath, inline);
  }

  const found = findConfigFile();
  if (found) {
    return loadConfig(found, inline);
  }

  return finalize(DEFAULT_CONFIG, process.cwd(), inline);
}
