import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  HarvestConfig,
  PartialHarvestConfig,
} from "../types";
import { HarvestConfigSchema, PartialHarvestConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (XDG base directories on Linux)
const paths = envPaths("image-harvester", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<HarvestConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return HarvestConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialHarvestConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialHarvestConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialHarvestConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge, one level per config section
 */
export function mergeConfig(
  base: HarvestConfig,
  override: PartialHarvestConfig,
): HarvestConfig {
  return {
    search: { ...base.search, ...override.search },
    download: { ...base.download, ...override.download },
    filters: { ...base.filters, ...override.filters },
    output: { ...base.output, ...override.output },
    queries: { ...base.queries, ...override.queries },
    checkpoint: { ...base.checkpoint, ...override.checkpoint },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: HarvestConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
