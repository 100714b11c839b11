export class GitInvocationError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | null, stderr: string) {
    const detail = stderr.trim() || `exit code ${exitCode ?? "unknown"}`;
    super(`git ${args.join(" ")} failed: ${detail}`);
    this.name = "GitInvocationError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class RevisionNotFoundError extends Error {
  readonly hash: string;
  readonly path: string;

  constructor(hash: string, path: string) {
    super(`path '${path}' does not exist in commit ${hash}`);
    this.name = "RevisionNotFoundError";
    this.hash = hash;
    this.path = path;
  }
}

/** A probe could not read or match the file at a commit. Absorbed as `found = false`. */
export class ProbeRetrievalError extends Error {
  readonly hash: string;

  constructor(hash: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "ProbeRetrievalError";
    this.hash = hash;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class EmptyRangeError extends Error {
  constructor(message = "No commits found in the specified range.") {
    super(message);
    this.name = "EmptyRangeError";
  }
}

export class SearchCancelledError extends Error {
  constructor() {
    super("Search was cancelled.");
    this.name = "SearchCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
