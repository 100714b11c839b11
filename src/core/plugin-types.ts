import type { Command } from "commander";
import type { ContentMatcher } from "./matchers.ts";

export interface PluginLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface PluginContext {
  repoRoot: string;
  logDirectory: string;
  config: Record<string, unknown>;
  logger: PluginLogger;
}

export interface GcbPlugin {
  readonly meta: {
    name: string;
    version: string;
    description?: string;
  };

  activate?(context: PluginContext): Promise<void> | void;

  /** Matchers for additional file formats, chosen by file extension. */
  contentMatchers?: readonly ContentMatcher[];
  registerCommands?(program: Command, context: PluginContext): void;
}
