import { existsSync, readdirSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import type { GcbConfig } from "./config.ts";
import { NPM_PLUGIN_PREFIX, PLUGIN_DIRNAME } from "./constants.ts";
import { errorMessage } from "./errors.ts";
import type { GcbPlugin, PluginContext, PluginLogger } from "./plugin-types.ts";

export interface LoadedPlugin {
  plugin: GcbPlugin;
  source: string;
}

const PLUGIN_EXTENSIONS = [".ts", ".js", ".mjs"];

function createPluginLogger(pluginName: string): PluginLogger {
  return {
    info(message: string) {
      console.error(`[plugin:${pluginName}] ${message}`);
    },
    warn(message: string) {
      console.error(`[plugin:${pluginName}] warn: ${message}`);
    },
    error(message: string) {
      console.error(`[plugin:${pluginName}] error: ${message}`);
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isValidPlugin(value: unknown): value is GcbPlugin {
  if (!isRecord(value) || !isRecord(value.meta)) {
    return false;
  }

  const { meta } = value;
  if (typeof meta.name !== "string" || typeof meta.version !== "string") {
    return false;
  }

  return value.contentMatchers === undefined || Array.isArray(value.contentMatchers);
}

async function importPlugin(specifier: string): Promise<GcbPlugin | null> {
  try {
    const mod: unknown = await import(specifier);
    const exported = isRecord(mod) && mod.default !== undefined ? mod.default : mod;

    if (!isValidPlugin(exported)) {
      console.error(`[plugins] skipping ${specifier}: invalid plugin shape (missing meta)`);
      return null;
    }

    return exported;
  } catch (error) {
    console.error(`[plugins] failed to load ${specifier}: ${errorMessage(error)}`);
    return null;
  }
}

function discoverLocalPlugins(dir: string): string[] {
  if (!existsSync(dir)) {
    return [];
  }

  try {
    return readdirSync(dir)
      .filter((file) => PLUGIN_EXTENSIONS.includes(path.extname(file)) && !file.endsWith(".d.ts"))
      .sort()
      .map((file) => path.join(dir, file));
  } catch {
    return [];
  }
}

function discoverNpmPlugins(repoRoot: string): string[] {
  const nodeModulesDir = path.join(repoRoot, "node_modules");
  if (!existsSync(nodeModulesDir)) {
    return [];
  }

  try {
    return readdirSync(nodeModulesDir)
      .filter((name) => name.startsWith(NPM_PLUGIN_PREFIX))
      .sort();
  } catch {
    return [];
  }
}

export function hasPluginSources(repoRoot: string, config: GcbConfig, homeDir: string = homedir()): boolean {
  if (config.plugins && config.plugins.length > 0) {
    return true;
  }

  return (
    discoverNpmPlugins(repoRoot).length > 0 ||
    discoverLocalPlugins(path.join(homeDir, PLUGIN_DIRNAME, "plugins")).length > 0 ||
    discoverLocalPlugins(path.join(repoRoot, PLUGIN_DIRNAME, "plugins")).length > 0
  );
}

export async function discoverAndLoadPlugins(
  repoRoot: string,
  config: GcbConfig,
  homeDir: string = homedir(),
): Promise<LoadedPlugin[]> {
  const specifiers: Array<{ specifier: string; source: string }> = [];

  if (config.plugins) {
    // Explicit plugin list — resolve relative paths against repo root
    for (const entry of config.plugins) {
      if (entry.startsWith(".") || entry.startsWith("/")) {
        specifiers.push({
          specifier: path.resolve(repoRoot, entry),
          source: entry,
        });
      } else {
        specifiers.push({ specifier: entry, source: `npm:${entry}` });
      }
    }
  } else {
    // Auto-discovery: npm → global → repo
    for (const name of discoverNpmPlugins(repoRoot)) {
      specifiers.push({ specifier: name, source: `npm:${name}` });
    }

    const globalPluginDir = path.join(homeDir, PLUGIN_DIRNAME, "plugins");
    for (const filePath of discoverLocalPlugins(globalPluginDir)) {
      specifiers.push({ specifier: filePath, source: `global:${path.basename(filePath)}` });
    }

    const repoPluginDir = path.join(repoRoot, PLUGIN_DIRNAME, "plugins");
    for (const filePath of discoverLocalPlugins(repoPluginDir)) {
      specifiers.push({ specifier: filePath, source: `repo:${path.basename(filePath)}` });
    }
  }

  const loaded: LoadedPlugin[] = [];

  for (const { specifier, source } of specifiers) {
    const plugin = await importPlugin(specifier);
    if (plugin) {
      loaded.push({ plugin, source });
    }
  }

  return loaded;
}

export function createPluginContext(
  repoRoot: string,
  logDirectory: string,
  pluginName: string,
  pluginConfig: Record<string, unknown>,
): PluginContext {
  return {
    repoRoot,
    logDirectory,
    config: pluginConfig,
    logger: createPluginLogger(pluginName),
  };
}
