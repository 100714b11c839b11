import type { Command } from "commander";
import type { GcbConfig } from "./config.ts";
import { errorMessage } from "./errors.ts";
import { type ContentMatcher, fileExtension, selectContentMatcher } from "./matchers.ts";
import { type LoadedPlugin, createPluginContext } from "./plugin-loader.ts";
import type { PluginContext } from "./plugin-types.ts";

interface PluginInfo {
  name: string;
  version: string;
  source: string;
  extensionPoints: string[];
}

export class PluginRegistry {
  private readonly plugins: PluginInfo[] = [];
  private readonly contentMatchers = new Map<string, ContentMatcher>();
  private readonly commandRegistrars: Array<{
    pluginName: string;
    register: (program: Command, context: PluginContext) => void;
  }> = [];
  private readonly contexts = new Map<string, PluginContext>();

  private registerWithQualifiedName<T>(
    map: Map<string, T>,
    pluginName: string,
    extensionName: string,
    value: T,
  ): void {
    const qualified = `${pluginName}:${extensionName}`;
    map.set(qualified, value);

    // Register unqualified alias if no conflict
    if (!map.has(extensionName)) {
      map.set(extensionName, value);
    }
  }

  register(loaded: LoadedPlugin, context: PluginContext): void {
    const { plugin, source } = loaded;
    const pluginName = plugin.meta.name;
    const extensionPoints: string[] = [];

    this.contexts.set(pluginName, context);

    if (plugin.contentMatchers) {
      for (const matcher of plugin.contentMatchers) {
        extensionPoints.push(`matcher:${matcher.name}`);
        for (const extension of matcher.extensions) {
          this.registerWithQualifiedName(
            this.contentMatchers,
            pluginName,
            extension.toLowerCase(),
            matcher,
          );
        }
      }
    }

    if (plugin.registerCommands) {
      extensionPoints.push("commands");
      this.commandRegistrars.push({
        pluginName,
        register: plugin.registerCommands.bind(plugin),
      });
    }

    this.plugins.push({
      name: pluginName,
      version: plugin.meta.version,
      source,
      extensionPoints,
    });
  }

  /** First plugin registered for the extension wins; `plugin:.ext` picks a specific one. */
  getContentMatcher(extensionOrQualified: string): ContentMatcher | undefined {
    return this.contentMatchers.get(extensionOrQualified.toLowerCase());
  }

  /** Plugin matcher for the file's extension, otherwise the built-in choice. */
  matcherFor(filePath: string): ContentMatcher {
    const pluginMatcher = this.getContentMatcher(fileExtension(filePath));
    return pluginMatcher ?? selectContentMatcher(filePath);
  }

  registerCommands(program: Command): void {
    for (const { pluginName, register } of this.commandRegistrars) {
      const context = this.contexts.get(pluginName);
      if (context) {
        register(program, context);
      }
    }
  }

  listPlugins(): readonly PluginInfo[] {
    return this.plugins;
  }

  get size(): number {
    return this.plugins.length;
  }
}

export async function buildRegistry(
  loadedPlugins: LoadedPlugin[],
  repoRoot: string,
  logDirectory: string,
  config: GcbConfig,
): Promise<PluginRegistry> {
  const registry = new PluginRegistry();

  for (const loaded of loadedPlugins) {
    const pluginName = loaded.plugin.meta.name;
    const pluginConf = config.pluginConfig?.[pluginName] ?? {};
    const context = createPluginContext(repoRoot, logDirectory, pluginName, pluginConf);

    if (loaded.plugin.activate) {
      try {
        await loaded.plugin.activate(context);
      } catch (error) {
        console.error(`[plugins] failed to activate ${pluginName}: ${errorMessage(error)}`);
        continue;
      }
    }

    registry.register(loaded, context);
  }

  return registry;
}
