/**
 * Version constant read from package.json at module load time
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const findPackageJson = (start: string): string | undefined => {
  let dir = start;
  for (;;) {
    const candidate = join(dir, "package.json");
    try {
      return readFileSync(candidate, "utf-8");
    } catch {
      const parent = dirname(dir);
      if (parent === dir) return undefined;
      dir = parent;
    }
  }
};

const readVersion = (): string => {
  const text = findPackageJson(dirname(fileURLToPath(import.meta.url)));
  if (text === undefined) return "unknown";
  const json: unknown = JSON.parse(text);
  if (
    typeof json === "object" && json !== null && "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "unknown";
};

export const VERSION = readVersion();
