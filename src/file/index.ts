import { z } from "zod";
import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

export const EntrySchema = z.object({
  path: z.string(),
  name: z.string(),
  size: z.number(),
  mtime: z.number(),
});

export type Entry = z.infer<typeof EntrySchema>;

export interface ListFilter {
  prefix?: string;
  extension?: string;
}

export class File {
  static async readText(path: string): Promise<string> {
    const stats = await stat(path).catch(() => null);
    if (!stats) throw new Error(`File not found: ${path}`);
    if (stats.isDirectory()) {
      throw new Error(`Cannot read directory as file: ${path}`);
    }
    return await readFile(path, "utf8");
  }

  /** Parse a JSON file. Read failures and syntax errors propagate. */
  static async readJson(path: string): Promise<unknown> {
    const text = await this.readText(path);
    return JSON.parse(text) as unknown;
  }

  static async writeJson(path: string, value: unknown): Promise<void> {
    await this.ensureDir(dirname(path));
    await writeFile(path, JSON.stringify(value, null, 2) + "\n", "utf8");
  }

  static async ensureDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
  }

  /** Regular files directly inside `dir`, sorted by name. Symlinks count when they resolve to a file. */
  static async list(dir: string, filter: ListFilter = {}): Promise<Entry[]> {
    const dirents = await readdir(dir, { withFileTypes: true });
    const entries: Entry[] = [];

    for (const dirent of dirents) {
      if (!dirent.isFile() && !dirent.isSymbolicLink()) continue;
      if (filter.prefix && !dirent.name.startsWith(filter.prefix)) continue;
      if (filter.extension && !dirent.name.endsWith(filter.extension)) continue;

      const fullPath = join(dir, dirent.name);
      const stats = await stat(fullPath).catch(() => null);
      if (stats?.isFile()) {
        entries.push({
          path: fullPath,
          name: basename(fullPath),
          size: stats.size,
          mtime: stats.mtime.getTime(),
        });
      }
    }

    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  static async isDirectory(path: string): Promise<boolean> {
    const stats = await stat(path).catch(() => null);
    return stats?.isDirectory() ?? false;
  }
}
