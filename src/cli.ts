#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from "commander";
import { runLocate } from "./commands/locate.ts";
import { type SearchOptions, runSearch } from "./commands/search.ts";
import { loadGcbConfig } from "./core/config.ts";
import { errorMessage } from "./core/errors.ts";
import { getRepoRoot } from "./core/git.ts";
import { resolveWorkspacePaths } from "./core/paths.ts";
import { discoverAndLoadPlugins, hasPluginSources } from "./core/plugin-loader.ts";
import { type PluginRegistry, buildRegistry } from "./core/plugin-registry.ts";

function nonEmpty(flagName: string): (value: string) => string {
  return (value) => {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      throw new InvalidArgumentError(`${flagName} must not be empty.`);
    }
    return trimmed;
  };
}

const program = new Command();

program
  .name("gcb")
  .description("Find the commits where a string first and last appears in a file's git history")
  .version("0.1.0")
  .option("--no-plugins", "Disable all plugin loading");

program
  .command("search")
  .description("Bisect a file's history for the range of commits containing a string")
  .argument("<file>", "Path of the tracked file, relative to the working directory")
  .argument("<query>", "Literal string to look for")
  .option("--earliest-commit <ref>", "Oldest commit to consider", nonEmpty("--earliest-commit"))
  .option("--latest-commit <ref>", "Newest commit to consider", nonEmpty("--latest-commit"))
  .option("-C, --working-directory <path>", "Git working tree to search (defaults to cwd)")
  .option("--log-directory <path>", "Directory for search_log.txt and materialized revisions")
  .option("--follow", "Follow the file across renames")
  .option("--no-linear-fallback", "Disable the linear scan after a negative probe")
  .option("--progress", "Print search progress to stderr", false)
  .action(
    async (
      file: string,
      query: string,
      options: {
        earliestCommit?: string;
        latestCommit?: string;
        workingDirectory?: string;
        logDirectory?: string;
        follow?: boolean;
        linearFallback: boolean;
        progress: boolean;
      },
      command: Command,
    ) => {
      if (query.length === 0) {
        throw new InvalidArgumentError("Search string must not be empty.");
      }

      const searchOptions: SearchOptions = { progress: options.progress };
      if (options.earliestCommit !== undefined) {
        searchOptions.earliestCommit = options.earliestCommit;
      }
      if (options.latestCommit !== undefined) {
        searchOptions.latestCommit = options.latestCommit;
      }
      if (options.workingDirectory !== undefined) {
        searchOptions.workingDirectory = options.workingDirectory;
      }
      if (options.logDirectory !== undefined) {
        searchOptions.logDirectory = options.logDirectory;
      }
      if (options.follow !== undefined) {
        searchOptions.follow = options.follow;
      }
      // Only an explicit flag overrides the config file.
      if (command.getOptionValueSource("linearFallback") === "cli") {
        searchOptions.linearFallback = options.linearFallback;
      }

      await runSearch(file, query, searchOptions, { registry });
    },
  );

program
  .command("locate")
  .description("List every path in the repository history whose file name matches")
  .argument("<file-name>", "File name, or a glob such as '*.xlsx' or 'config/*.json'")
  .option("-C, --working-directory <path>", "Git working tree to search (defaults to cwd)")
  .action(async (fileName: string, options: { workingDirectory?: string }) => {
    await runLocate(
      fileName,
      options.workingDirectory !== undefined ? { workingDirectory: options.workingDirectory } : {},
    );
  });

program.showHelpAfterError();

let registry: PluginRegistry | undefined;

async function loadPlugins(): Promise<PluginRegistry | undefined> {
  // Options are not parsed yet; plugin commands must be registered before parsing.
  if (process.argv.includes("--no-plugins")) {
    return undefined;
  }

  try {
    // Quick filesystem check before spawning git subprocesses
    const cwd = process.cwd();
    const quickConfig = loadGcbConfig(cwd);
    if (!hasPluginSources(cwd, quickConfig)) {
      return undefined;
    }

    const repoRoot = getRepoRoot(cwd);
    const config = loadGcbConfig(repoRoot);
    const loaded = await discoverAndLoadPlugins(repoRoot, config);

    if (loaded.length === 0) {
      return undefined;
    }

    const paths = resolveWorkspacePaths(repoRoot, config.logDirectory);
    const reg = await buildRegistry(loaded, repoRoot, paths.logDirectory, config);

    reg.registerCommands(program);
    return reg;
  } catch {
    // Plugin loading should never prevent CLI from running
    return undefined;
  }
}

loadPlugins()
  .then((reg) => {
    registry = reg;
    return program.parseAsync(process.argv);
  })
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
