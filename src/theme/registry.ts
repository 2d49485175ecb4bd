import { File } from "../file";
import { DEFAULT_PREFIX } from "./generator";
import { ThemeFamilySchema, themeColorsFor, type ThemeColors, type ThemeFamily, type ThemeMode } from "./types";

export interface LoadFailure {
  path: string;
  reason: string;
}

/**
 * Theme families read back from a directory of generated files, keyed by id.
 * A file that fails to load is logged and skipped. A directory that cannot be
 * listed yields an empty registry.
 */
export class ThemeRegistry {
  private constructor(
    private readonly themes: Map<string, ThemeFamily>,
    readonly failures: LoadFailure[]
  ) {}

  static async load(dir: string, prefix: string = DEFAULT_PREFIX): Promise<ThemeRegistry> {
    const themes = new Map<string, ThemeFamily>();
    const failures: LoadFailure[] = [];

    if (!(await File.isDirectory(dir))) {
      console.error(`Failed to list themes: ${dir}. Error: not a directory`);
      return new ThemeRegistry(themes, failures);
    }

    const entries = await File.list(dir, { prefix: `${prefix}-`, extension: ".json" });
    for (const entry of entries) {
      try {
        const family = ThemeFamilySchema.parse(await File.readJson(entry.path));
        if (themes.has(family.id)) {
          throw new Error(`Duplicate theme id: ${family.id}`);
        }
        themes.set(family.id, family);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`Failed to load theme: ${entry.path}. Error: ${reason}`);
        failures.push({ path: entry.path, reason });
      }
    }

    return new ThemeRegistry(themes, failures);
  }

  get(id: string): ThemeFamily | undefined {
    return this.themes.get(id);
  }

  colors(id: string, mode: ThemeMode): ThemeColors | undefined {
    const family = this.themes.get(id);
    return family ? themeColorsFor(family, mode) : undefined;
  }

  list(): ThemeFamily[] {
    return Array.from(this.themes.values()).sort((a, b) => a.name.localeCompare(b.name));
  }
}
