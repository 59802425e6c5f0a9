// src/core/config/config.ts
// Configuration system for cae: loader and runtime limits

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

/** What `,` does once the input source is exhausted. */
export type EofPolicy = "zero" | "unchanged" | "error";

export const EOF_POLICIES: readonly EofPolicy[] = ["zero", "unchanged", "error"];

export type LoaderConfig = {
  /** Largest capacity a region declaration may ask for */
  maxRegionCapacity: number;
};

export type RuntimeConfig = {
  /** Maximum machine steps per run; null = unlimited */
  maxSteps: number | null;
  /** Maximum simultaneously active call frames; null = unlimited */
  maxCallDepth: number | null;
  onEof: EofPolicy;
};

export type CaeConfig = {
  loader: LoaderConfig;
  runtime: RuntimeConfig;
};

export type ConfigOverrides = {
  loader?: Partial<LoaderConfig>;
  runtime?: Partial<RuntimeConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_LOADER_CONFIG: LoaderConfig = {
  maxRegionCapacity: 16 * 1024 * 1024,
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxSteps: null,
  maxCallDepth: null,
  onEof: "zero",
};

export const DEFAULT_CONFIG: CaeConfig = {
  loader: DEFAULT_LOADER_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["cae.config.json"];

// =========================================================================
// Value helpers
// =========================================================================

export function isEofPolicy(v: unknown): v is EofPolicy {
  return EOF_POLICIES.some((p) => p === v);
}

function positiveInt(v: unknown): number | undefined {
  const n = typeof v === "string" ? parseInt(v, 10) : v;
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : undefined;
}

/** Positive integer, or null for the spellings of "no limit". */
function limit(v: unknown): number | null | undefined {
  if (v === null || v === "unlimited" || v === "none" || v === 0 || v === "0") return null;
  return positiveInt(v);
}

function record(v: unknown): Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : {};
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables. Unset or malformed
 * variables fall back to the defaults.
 */
export function configFromEnv(prefix = "CAE", env: NodeJS.ProcessEnv = process.env): CaeConfig {
  const maxRegionCapacity = positiveInt(env[`${prefix}_MAX_REGION_CAPACITY`]) ?? DEFAULT_LOADER_CONFIG.maxRegionCapacity;
  const maxSteps = limit(env[`${prefix}_MAX_STEPS`]);
  const maxCallDepth = limit(env[`${prefix}_MAX_CALL_DEPTH`]);
  const eof = env[`${prefix}_EOF`];

  return {
    loader: { maxRegionCapacity },
    runtime: {
      maxSteps: maxSteps === undefined ? DEFAULT_RUNTIME_CONFIG.maxSteps : maxSteps,
      maxCallDepth: maxCallDepth === undefined ? DEFAULT_RUNTIME_CONFIG.maxCallDepth : maxCallDepth,
      onEof: isEofPolicy(eof) ? eof : DEFAULT_RUNTIME_CONFIG.onEof,
    },
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return configFromObject(data);
}

/**
 * Create overrides from a plain object (e.g. parsed JSON). Only keys that
 * are present and well-formed end up in the result; camelCase and
 * snake_case spellings are both accepted.
 */
export function configFromObject(data: unknown): ConfigOverrides {
  const loaderData = record(record(data).loader);
  const runtimeData = record(record(data).runtime);
  const pick = (obj: Record<string, unknown>, camel: string, snake: string) =>
    camel in obj ? obj[camel] : obj[snake];

  const loader: Partial<LoaderConfig> = {};
  const maxRegionCapacity = positiveInt(pick(loaderData, "maxRegionCapacity", "max_region_capacity"));
  if (maxRegionCapacity !== undefined) loader.maxRegionCapacity = maxRegionCapacity;

  const runtime: Partial<RuntimeConfig> = {};
  const maxSteps = limit(pick(runtimeData, "maxSteps", "max_steps"));
  if (maxSteps !== undefined) runtime.maxSteps = maxSteps;
  const maxCallDepth = limit(pick(runtimeData, "maxCallDepth", "max_call_depth"));
  if (maxCallDepth !== undefined) runtime.maxCallDepth = maxCallDepth;
  const onEof = pick(runtimeData, "onEof", "on_eof");
  if (isEofPolicy(onEof)) runtime.onEof = onEof;

  return { loader, runtime };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): CaeConfig {
  const result: CaeConfig = {
    loader: { ...DEFAULT_LOADER_CONFIG },
    runtime: { ...DEFAULT_RUNTIME_CONFIG },
  };

  for (const cfg of configs) {
    if (cfg.loader) {
      result.loader = { ...result.loader, ...cfg.loader };
    }
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides (CLI flags) > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
  cwd?: string;
}): CaeConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CaeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.loader.maxRegionCapacity) || config.loader.maxRegionCapacity < 1) {
    errors.push("maxRegionCapacity must be a positive integer");
  }
  const { maxSteps, maxCallDepth, onEof } = config.runtime;
  if (maxSteps !== null && (!Number.isInteger(maxSteps) || maxSteps < 1)) {
    errors.push("maxSteps must be a positive integer or null");
  }
  if (maxCallDepth !== null && (!Number.isInteger(maxCallDepth) || maxCallDepth < 1)) {
    errors.push("maxCallDepth must be a positive integer or null");
  }
  if (!isEofPolicy(onEof)) {
    errors.push(`onEof must be one of: ${EOF_POLICIES.join(", ")}`);
  }

  if (maxSteps !== null && maxSteps < 1000) {
    warnings.push("maxSteps is very low, may cause premature termination");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
