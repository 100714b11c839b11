export const TOOL_NAME = "git-content-bisect";
export const CONFIG_FILENAME = ".gcbrc.json";
export const PLUGIN_DIRNAME = ".gcb";
export const NPM_PLUGIN_PREFIX = "gcb-plugin-";
export const AUDIT_LOG_FILENAME = "search_log.txt";
export const UNKNOWN_TIME = "unknown time";
export const SESSION_RULE = "=".repeat(50);

export const PROGRESS_STARTED = 0.05;
export const PROGRESS_TIMELINE_RESOLVED = 0.25;
export const PROGRESS_LAST_MATCH_DONE = 0.625;
export const PROGRESS_COMPLETE = 1;
