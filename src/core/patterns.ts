import path from "node:path";

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function globToRegex(glob: string, flags = ""): RegExp {
  let pattern = "^";
  for (let i = 0; i < glob.length; i += 1) {
    const char = glob[i];
    const next = glob[i + 1];

    if (char === "*" && next === "*") {
      pattern += ".*";
      i += 1;
      continue;
    }

    if (char === "*") {
      pattern += "[^/]*";
      continue;
    }

    if (char === "?") {
      pattern += "[^/]";
      continue;
    }

    pattern += escapeRegex(char ?? "");
  }

  pattern += "$";
  return new RegExp(pattern, flags);
}

export function isGlob(value: string): boolean {
  return value.includes("*") || value.includes("?");
}

export function normaliseFilePath(file: string): string {
  return file.split(path.sep).join("/");
}
