import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/** Read version from package.json. */
function readVersion(): string {
  // In ESM, __dirname isn't available; derive from import.meta.url
  let selfDir: string;
  try {
    selfDir = dirname(fileURLToPath(import.meta.url));
  } catch {
    return "unknown";
  }

  const candidates = [
    join(selfDir, "..", "package.json"),       // from src/
    join(selfDir, "..", "..", "package.json"), // from dist/src/
  ];
  for (const p of candidates) {
    if (existsSync(p)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(p, "utf-8"));
        if (typeof pkg === "object" && pkg !== null && "name" in pkg && "version" in pkg &&
            pkg.name === "monologue" && typeof pkg.version === "string") {
          return pkg.version;
        }
      } catch {
        // try next candidate
      }
    }
  }
  return "unknown";
}

// Cache version at module load
const VERSION = readVersion();

export function getVersion(): string {
  return VERSION;
}
