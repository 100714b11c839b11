import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import { CONFIG_FILENAME } from "./constants.ts";

export interface GcbConfig {
  logDirectory?: string;
  follow?: boolean;
  linearFallback?: boolean;
  plugins?: string[];
  pluginConfig?: Record<string, Record<string, unknown>>;
}

function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    // Replace $$ with a placeholder, interpolate env vars, then restore literal $
    const PLACEHOLDER = "\x00DOLLAR\x00";
    return value
      .replaceAll("$$", PLACEHOLDER)
      .replace(/\$\{([^}]+)\}|\$([A-Z_][A-Z0-9_]*)/g, (_match, braced?: string, bare?: string) => {
        const varName = braced ?? bare ?? "";
        return process.env[varName] ?? "";
      })
      .replaceAll(PLACEHOLDER, "$");
  }

  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }

  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = interpolateEnvVars(val);
    }
    return result;
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toConfig(raw: unknown): GcbConfig | null {
  if (!isRecord(raw)) {
    return null;
  }

  const config: GcbConfig = {};
  if (typeof raw.logDirectory === "string") {
    config.logDirectory = raw.logDirectory;
  }
  if (typeof raw.follow === "boolean") {
    config.follow = raw.follow;
  }
  if (typeof raw.linearFallback === "boolean") {
    config.linearFallback = raw.linearFallback;
  }
  if (Array.isArray(raw.plugins)) {
    config.plugins = raw.plugins.filter((entry): entry is string => typeof entry === "string");
  }
  if (isRecord(raw.pluginConfig)) {
    const pluginConfig: Record<string, Record<string, unknown>> = {};
    for (const [name, conf] of Object.entries(raw.pluginConfig)) {
      if (isRecord(conf)) {
        pluginConfig[name] = conf;
      }
    }
    config.pluginConfig = pluginConfig;
  }

  return config;
}

function loadConfigFile(filePath: string): GcbConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    return toConfig(JSON.parse(readFileSync(filePath, "utf8")));
  } catch {
    return null;
  }
}

function interpolateConfig(config: GcbConfig): GcbConfig {
  const result: GcbConfig = { ...config };
  if (config.logDirectory !== undefined) {
    const interpolated = interpolateEnvVars(config.logDirectory);
    if (typeof interpolated === "string") {
      result.logDirectory = interpolated;
    }
  }
  if (config.pluginConfig) {
    const interpolated = interpolateEnvVars(config.pluginConfig);
    if (isRecord(interpolated)) {
      const pluginConfig: Record<string, Record<string, unknown>> = {};
      for (const [name, conf] of Object.entries(interpolated)) {
        if (isRecord(conf)) {
          pluginConfig[name] = conf;
        }
      }
      result.pluginConfig = pluginConfig;
    }
  }
  return result;
}

/** Merges `~/.gcbrc.json` and `<repoRoot>/.gcbrc.json`; repo values win per key. */
export function loadGcbConfig(repoRoot: string, homeDir: string = homedir()): GcbConfig {
  const globalConfig = loadConfigFile(path.join(homeDir, CONFIG_FILENAME));
  const repoConfig = loadConfigFile(path.join(repoRoot, CONFIG_FILENAME));

  if (!repoConfig && !globalConfig) {
    return {};
  }

  if (!globalConfig || !repoConfig) {
    return interpolateConfig(repoConfig ?? globalConfig ?? {});
  }

  const merged: GcbConfig = { ...globalConfig, ...repoConfig };

  // pluginConfig: merge per-plugin, repo overrides global per-key
  if (globalConfig.pluginConfig || repoConfig.pluginConfig) {
    merged.pluginConfig = { ...globalConfig.pluginConfig };
    for (const [pluginName, pluginConf] of Object.entries(repoConfig.pluginConfig ?? {})) {
      merged.pluginConfig[pluginName] = {
        ...merged.pluginConfig[pluginName],
        ...pluginConf,
      };
    }
  }

  return interpolateConfig(merged);
}
