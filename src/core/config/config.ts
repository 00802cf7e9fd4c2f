// src/core/config/config.ts
// Configuration system for tagmatch runtimes

import * as fs from "fs";
import * as path from "path";
import { isSeverity } from "../../outcome/diagnostic";
import type { LogLevel } from "../../ports/diagnostics";

// =========================================================================
// Configuration Types
// =========================================================================

export type MatcherConfig = {
  /** Reuse compiled clause lists keyed by clause array identity */
  cacheCompiled: boolean;
  /** Report clauses that follow a catch-all (W0001) */
  reportUnreachable: boolean;
};

export type RegistryConfig = {
  /** Report a variant name moving from one type to another (W0002) */
  reportShadowing: boolean;
};

export type DiagnosticsConfig = {
  /** Lowest severity written by the console sink */
  minSeverity: LogLevel;
};

export type TagmatchConfig = {
  matcher: MatcherConfig;
  registry: RegistryConfig;
  diagnostics: DiagnosticsConfig;
};

export type PartialConfig = {
  matcher?: Partial<MatcherConfig>;
  registry?: Partial<RegistryConfig>;
  diagnostics?: Partial<DiagnosticsConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  cacheCompiled: true,
  reportUnreachable: true,
};

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = {
  reportShadowing: true,
};

export const DEFAULT_DIAGNOSTICS_CONFIG: DiagnosticsConfig = {
  minSeverity: "warning",
};

export const DEFAULT_CONFIG: TagmatchConfig = {
  matcher: DEFAULT_MATCHER_CONFIG,
  registry: DEFAULT_REGISTRY_CONFIG,
  diagnostics: DEFAULT_DIAGNOSTICS_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["tagmatch.config.json", "tagmatch.config.yaml", "tagmatch.config.yml"];

// =========================================================================
// Value coercion
// =========================================================================

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "silent" || isSeverity(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First of the camelCase / snake_case spellings that is present. */
function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}

function boolOr(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return parseBool(value) ?? fallback;
  return fallback;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "TAGMATCH", env: NodeJS.ProcessEnv = process.env): TagmatchConfig {
  const level = env[`${prefix}_LOG_LEVEL`]?.trim().toLowerCase();

  return {
    matcher: {
      cacheCompiled: parseBool(env[`${prefix}_CACHE_COMPILED`]) ?? DEFAULT_MATCHER_CONFIG.cacheCompiled,
      reportUnreachable: parseBool(env[`${prefix}_REPORT_UNREACHABLE`]) ?? DEFAULT_MATCHER_CONFIG.reportUnreachable,
    },
    registry: {
      reportShadowing: parseBool(env[`${prefix}_REPORT_SHADOWING`]) ?? DEFAULT_REGISTRY_CONFIG.reportShadowing,
    },
    diagnostics: {
      minSeverity: isLogLevel(level) ? level : DEFAULT_DIAGNOSTICS_CONFIG.minSeverity,
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): TagmatchConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Unknown keys are ignored; values of the wrong kind fall back to defaults.
 */
export function configFromObject(data: Record<string, unknown>): TagmatchConfig {
  const matcherData = isRecord(data.matcher) ? data.matcher : {};
  const registryData = isRecord(data.registry) ? data.registry : {};
  const diagnosticsData = isRecord(data.diagnostics) ? data.diagnostics : {};

  const level = pick(diagnosticsData, "minSeverity", "min_severity");

  return {
    matcher: {
      cacheCompiled: boolOr(pick(matcherData, "cacheCompiled", "cache_compiled"), DEFAULT_MATCHER_CONFIG.cacheCompiled),
      reportUnreachable: boolOr(pick(matcherData, "reportUnreachable", "report_unreachable"), DEFAULT_MATCHER_CONFIG.reportUnreachable),
    },
    registry: {
      reportShadowing: boolOr(pick(registryData, "reportShadowing", "report_shadowing"), DEFAULT_REGISTRY_CONFIG.reportShadowing),
    },
    diagnostics: {
      minSeverity: isLogLevel(level) ? level : DEFAULT_DIAGNOSTICS_CONFIG.minSeverity,
    },
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): TagmatchConfig {
  const result: TagmatchConfig = {
    matcher: { ...DEFAULT_CONFIG.matcher },
    registry: { ...DEFAULT_CONFIG.registry },
    diagnostics: { ...DEFAULT_CONFIG.diagnostics },
  };

  for (const cfg of configs) {
    if (cfg.matcher) {
      result.matcher = { ...result.matcher, ...cfg.matcher };
    }
    if (cfg.registry) {
      result.registry = { ...result.registry, ...cfg.registry };
    }
    if (cfg.diagnostics) {
      result.diagnostics = { ...result.diagnostics, ...cfg.diagnostics };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  overrides?: PartialConfig;
}): TagmatchConfig {
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
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    let top = stack[stack.length - 1];
    while (top && stack.length > 1 && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    const parent = top?.obj ?? result;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseYamlScalar(value);
    }
  }

  return result;
}

function parseYamlScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: TagmatchConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isLogLevel(config.diagnostics.minSeverity)) {
    errors.push(`Unknown diagnostics.minSeverity: ${String(config.diagnostics.minSeverity)}`);
  }

  if (config.diagnostics.minSeverity === "error" || config.diagnostics.minSeverity === "silent") {
    if (config.matcher.reportUnreachable || config.registry.reportShadowing) {
      warnings.push(`Warnings are enabled but diagnostics.minSeverity "${config.diagnostics.minSeverity}" hides them from the console`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
