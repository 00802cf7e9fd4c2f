// test/core/config/config.spec.ts
// Tests for configuration system

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.TAGMATCH_CACHE_COMPILED;
    delete process.env.TAGMATCH_REPORT_UNREACHABLE;
    delete process.env.TAGMATCH_REPORT_SHADOWING;
    delete process.env.TAGMATCH_LOG_LEVEL;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_CONFIG);
  });

  it("reads flags from TAGMATCH_* variables", () => {
    process.env.TAGMATCH_CACHE_COMPILED = "false";
    process.env.TAGMATCH_REPORT_UNREACHABLE = "off";
    process.env.TAGMATCH_REPORT_SHADOWING = "0";

    const config = configFromEnv();
    expect(config.matcher.cacheCompiled).toBe(false);
    expect(config.matcher.reportUnreachable).toBe(false);
    expect(config.registry.reportShadowing).toBe(false);
  });

  it("ignores values it cannot read as booleans", () => {
    process.env.TAGMATCH_CACHE_COMPILED = "maybe";
    expect(configFromEnv().matcher.cacheCompiled).toBe(true);
  });

  it("normalises the log level", () => {
    process.env.TAGMATCH_LOG_LEVEL = " ERROR ";
    expect(configFromEnv().diagnostics.minSeverity).toBe("error");
    process.env.TAGMATCH_LOG_LEVEL = "verbose";
    expect(configFromEnv().diagnostics.minSeverity).toBe("warning");
  });

  it("supports a custom prefix and env object", () => {
    const config = configFromEnv("MYAPP", { MYAPP_LOG_LEVEL: "silent", MYAPP_REPORT_SHADOWING: "no" });
    expect(config.diagnostics.minSeverity).toBe("silent");
    expect(config.registry.reportShadowing).toBe(false);
  });
});

describe("configFromObject", () => {
  it("creates config from camelCase object", () => {
    const config = configFromObject({
      matcher: { cacheCompiled: false },
      diagnostics: { minSeverity: "info" },
    });
    expect(config.matcher.cacheCompiled).toBe(false);
    expect(config.matcher.reportUnreachable).toBe(true);
    expect(config.diagnostics.minSeverity).toBe("info");
  });

  it("handles snake_case keys", () => {
    const config = configFromObject({
      matcher: { report_unreachable: false },
      registry: { report_shadowing: "off" },
      diagnostics: { min_severity: "hint" },
    });
    expect(config.matcher.reportUnreachable).toBe(false);
    expect(config.registry.reportShadowing).toBe(false);
    expect(config.diagnostics.minSeverity).toBe("hint");
  });

  it("falls back to defaults for values of the wrong kind", () => {
    const config = configFromObject({
      matcher: { cacheCompiled: 1 },
      registry: "yes",
      diagnostics: { minSeverity: "loud" },
    });
    expect(config).toEqual(DEFAULT_CONFIG);
  });
});

describe("mergeConfigs", () => {
  it("merges configs with later overriding earlier", () => {
    const merged = mergeConfigs(
      { matcher: { cacheCompiled: false }, diagnostics: { minSeverity: "info" } },
      { diagnostics: { minSeverity: "error" } }
    );
    expect(merged.matcher.cacheCompiled).toBe(false);
    expect(merged.matcher.reportUnreachable).toBe(true);
    expect(merged.diagnostics.minSeverity).toBe("error");
  });

  it("does not modify the defaults", () => {
    mergeConfigs({ matcher: { cacheCompiled: false } });
    expect(DEFAULT_CONFIG.matcher.cacheCompiled).toBe(true);
  });
});

describe("config files", () => {
  const originalEnv = process.env;
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.TAGMATCH_CACHE_COMPILED;
    delete process.env.TAGMATCH_LOG_LEVEL;
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tagmatch-config-"));
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads JSON files", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, JSON.stringify({ registry: { reportShadowing: false } }));
    expect(configFromFile(file).registry.reportShadowing).toBe(false);
  });

  it("reads YAML files", () => {
    const file = path.join(dir, "settings.yaml");
    fs.writeFileSync(
      file,
      ["# tagmatch settings", "matcher:", "  cache_compiled: false", "diagnostics:", '  min_severity: "hint"', ""].join("\n")
    );
    const config = configFromFile(file);
    expect(config.matcher.cacheCompiled).toBe(false);
    expect(config.matcher.reportUnreachable).toBe(true);
    expect(config.diagnostics.minSeverity).toBe("hint");
  });

  it("rejects missing files and unknown formats", () => {
    const missing = path.join(dir, "missing.json");
    expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);

    const toml = path.join(dir, "settings.toml");
    fs.writeFileSync(toml, "matcher = 1");
    expect(() => configFromFile(toml)).toThrow("Unsupported config file format: .toml");
  });

  it("rejects files that do not hold an object", () => {
    const file = path.join(dir, "list.json");
    fs.writeFileSync(file, "[1, 2]");
    expect(() => configFromFile(file)).toThrow(`Config file must contain an object: ${file}`);
  });

  it("finds the default config file in cwd and applies overrides last", () => {
    fs.writeFileSync(
      path.join(dir, "tagmatch.config.json"),
      JSON.stringify({ matcher: { cacheCompiled: false }, diagnostics: { minSeverity: "info" } })
    );
    const config = loadConfig({ cwd: dir, overrides: { diagnostics: { minSeverity: "error" } } });
    expect(config.matcher.cacheCompiled).toBe(false);
    expect(config.diagnostics.minSeverity).toBe("error");
  });

  it("falls back to the environment without a config file", () => {
    process.env.TAGMATCH_CACHE_COMPILED = "no";
    expect(loadConfig({ cwd: dir }).matcher.cacheCompiled).toBe(false);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("warns when enabled warnings would never reach the console", () => {
    const result = validateConfig(mergeConfigs({ diagnostics: { minSeverity: "silent" } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'Warnings are enabled but diagnostics.minSeverity "silent" hides them from the console',
    ]);
  });

  it("is quiet when every warning is switched off", () => {
    const result = validateConfig(
      mergeConfigs({
        matcher: { reportUnreachable: false },
        registry: { reportShadowing: false },
        diagnostics: { minSeverity: "error" },
      })
    );
    expect(result.warnings).toEqual([]);
  });
});
