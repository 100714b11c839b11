// Public type exports for plugin authors.
// Plugin authors import via: import type { GcbPlugin, ContentMatcher } from "git-content-bisect/plugin";

// Plugin contract
export type { GcbPlugin, PluginContext, PluginLogger } from "./core/plugin-types.ts";

// Core types plugin authors need
export type { ContentMatcher } from "./core/matchers.ts";
export type { ContentHandle } from "./core/history.ts";
