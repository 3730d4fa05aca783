// Config loader: reads ~/.config/zfs-kmod/config.yaml and deep-merges it over defaults.
// On first run (no config file) the default YAML is written and firstRun: true is returned.
// The merged document is validated with pluginConfigSchema; a document that fails
// validation is reported and replaced by the defaults.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { pluginConfigSchema, type PluginConfig } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "zfs-kmod");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: PluginConfig = {
  privilege: { use_sudo: true },
  packages: {
    utils: "zfs-utils",
    dkms: "zfs-dkms",
    module_family_prefixes: ["zfs-", "spl-"],
  },
  sources: {
    binary_db_url: "https://github.com/archzfs/archzfs/releases/download/experimental/archzfs.db",
    release_api_base: "https://api.github.com/repos/openzfs/zfs/releases/tags",
    release_tag_prefix: "zfs-",
    precompiled_source: "repository",
  },
  catalog: { auto_detect: true, variant_paths: [], variants: [], disabled: [] },
  scanner: { filter_kernels: true, refresh_index: true },
  errors: { command_timeout_ceiling: 0 },
  safety: { confirmation_threshold: "high", dry_run_bypass_confirmation: true },
};

const DEFAULT_CONFIG_YAML = `# zfs-kmod-mcp configuration
# Generated automatically on first run. All values shown are defaults.

privilege:
  use_sudo: true

packages:
  utils: zfs-utils
  dkms: zfs-dkms
  # Packages with these prefixes fall back to the binary release database
  module_family_prefixes: ["zfs-", "spl-"]

sources:
  binary_db_url: https://github.com/archzfs/archzfs/releases/download/experimental/archzfs.db
  release_api_base: https://api.github.com/repos/openzfs/zfs/releases/tags
  release_tag_prefix: "zfs-"
  # repository: pacman -S from a configured repo; release: pacman -U of the files
  # listed in the binary release database
  precompiled_source: repository

catalog:
  auto_detect: true
  # Directories holding *.yaml kernel variant definitions
  variant_paths: []
  variants: []
  disabled: []

scanner:
  # ZFS_KMOD_FILTER_KERNELS=false overrides this for a single process
  filter_kernels: true
  refresh_index: true

errors:
  command_timeout_ceiling: 0

safety:
  confirmation_threshold: high
  dry_run_bypass_confirmation: true
`;

export interface ConfigResult {
  config: PluginConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const overrides = isPlainObject(parsed) ? parsed : {};
    const merged = deepMerge(toRecord(DEFAULT_CONFIG), overrides);
    const result = pluginConfigSchema.safeParse(merged);
    if (!result.success) {
      logger.error({ configPath, issues: result.error.issues }, "Invalid config, using defaults");
      return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
    }
    return { config: result.data, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
  }
}

/** Deep merge b into a (a provides defaults, b overrides). Arrays are replaced, not merged. */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: PluginConfig): Record<string, unknown> {
  return { ...config };
}
