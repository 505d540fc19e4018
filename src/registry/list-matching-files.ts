import { readdirSync } from "node:fs";
import { extname } from "node:path";

/**
 * Extension of a file name without its dot: "app.log" → "log".
 * Dotfiles with no other dot (".bashrc") and names ending in "." have none.
 */
export function extensionOf(name: string): string {
  return extname(name).slice(1);
}

/**
 * List the files of `dir` whose extension is in `extensions`
 * (every file when the set is empty). Case-sensitive, not recursive.
 * Returns names, sorted.
 */
export function listMatchingFiles(
  dir: string,
  extensions: ReadonlySet<string>,
): string[] {
  const entries = readdirSync(dir, { withFileTypes: true });

  return entries
    .filter((e) => {
      // Symlinks are kept; the registry skips those that do not lead to a file.
      if (!e.isFile() && !e.isSymbolicLink()) return false;
      if (extensions.size === 0) return true;
      return extensions.has(extensionOf(e.name));
    })
    .map((e) => e.name)
    .sort();
}
