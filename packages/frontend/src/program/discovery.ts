/**
 * Source file discovery
 */

import * as fs from "node:fs";
import * as path from "node:path";

const SKIPPED_DIRECTORIES = new Set(["node_modules", "dist", ".git"]);

const isAnalysableFile = (name: string): boolean =>
  (name.endsWith(".ts") || name.endsWith(".tsx")) && !name.endsWith(".d.ts");

/**
 * Recursively scan a directory for TypeScript sources, sorted by path
 */
export const scanSourceFiles = (dir: string): readonly string[] => {
  if (!fs.existsSync(dir)) {
    return [];
  }

  const results: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) {
        results.push(...scanSourceFiles(fullPath));
      }
    } else if (isAnalysableFile(entry.name)) {
      results.push(fullPath);
    }
  }

  return results.sort();
};
