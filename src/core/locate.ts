import path from "node:path";
import { globToRegex, isGlob, normaliseFilePath } from "./patterns.ts";

/**
 * Paths whose file name equals `name` (case-insensitive); a name with a slash must match
 * the path's trailing segments. A name containing `*` or `?`
 * is a glob: without a slash it is matched against the file name, otherwise against
 * the whole path.
 */
export function matchPathsByFileName(paths: readonly string[], name: string): string[] {
  const needle = normaliseFilePath(name.trim());
  if (!needle) {
    return [];
  }

  if (isGlob(needle)) {
    const regex = globToRegex(needle, "i");
    const matchWholePath = needle.includes("/");
    return paths.filter((file) => regex.test(matchWholePath ? file : path.posix.basename(file)));
  }

  const lowered = needle.toLowerCase();
  if (lowered.includes("/")) {
    return paths.filter((file) => {
      const candidate = file.toLowerCase();
      return candidate === lowered || candidate.endsWith(`/${lowered}`);
    });
  }

  return paths.filter((file) => path.posix.basename(file).toLowerCase() === lowered);
}
