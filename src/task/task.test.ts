import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { Task, getAllTasks } from "./index";

function collect() {
  const lines: string[] = [];
  return { lines, log: (line: string) => lines.push(line) };
}

describe("Task", () => {
  it("registers the generate and validate tasks", () => {
    expect(getAllTasks().map((t) => t.id)).toEqual(expect.arrayContaining(["generate", "validate"]));
  });

  it("rejects unknown tasks", async () => {
    await expect(Task.execute("publish")).rejects.toThrow("Task not found: publish");
  });

  it("parses arguments and merges context metadata", async () => {
    Task.define("echo", {
      name: "Echo",
      description: "Echo a word",
      parameters: z.object({ word: z.string().default("hi") }),
      execute: async (args, context) => {
        context.setMetadata("seen", args.word);
        return { title: "Echo", success: true, metadata: { length: args.word.length }, output: args.word };
      },
    });

    const result = await Task.execute("echo", {}, { metadata: { caller: "test" } });
    expect(result.output).toBe("hi");
    expect(result.metadata).toEqual({ caller: "test", seen: "hi", length: 2 });
    await expect(Task.execute("echo", { word: 3 })).rejects.toThrow();
  });
});

describe("generate and validate", () => {
  let root: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "palette-themes-task-"));
    outputDir = join(root, "assets", "themes");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes one pretty-printed file per variant", async () => {
    const { lines, log } = collect();
    const result = await Task.execute("generate", { outputDir }, { log });

    expect(result.success).toBe(true);
    expect(result.metadata.count).toBe(4);
    expect((await readdir(outputDir)).sort()).toEqual([
      "catppuccin-frappe.json",
      "catppuccin-latte.json",
      "catppuccin-macchiato.json",
      "catppuccin-mocha.json",
    ]);
    expect(lines[0]).toBe(`Generating Catppuccin theme files in ${outputDir}/...`);
    expect(lines[1]).toBe("  Generating latte theme...");
    expect(lines[2]).toBe(`    Saved to ${join(outputDir, "catppuccin-latte.json")}`);

    const text = await readFile(join(outputDir, "catppuccin-mocha.json"), "utf8");
    expect(text.startsWith('{\n  "id": "catppuccin-mocha",\n  "name": "Catppuccin Mocha",\n')).toBe(true);
    expect(text.endsWith("}\n")).toBe(true);
  });

  it("validates freshly generated output", async () => {
    await Task.execute("generate", { outputDir }, { log: () => {} });
    const { lines, log } = collect();
    const result = await Task.execute("validate", { outputDir }, { log });

    expect(result.success).toBe(true);
    expect(result.metadata).toMatchObject({ total: 4, valid: 4, invalid: 0 });
    expect(lines).toContain("  ✓ catppuccin-mocha.json: VALID");
    expect(lines).toContain("    ID: catppuccin-mocha, Name: Catppuccin Mocha");
    expect(lines.at(-1)).toBe("All theme files are valid!");
  });

  it("itemizes errors per file and keeps going", async () => {
    await Task.execute("generate", { outputDir }, { log: () => {} });
    const mochaPath = join(outputDir, "catppuccin-mocha.json");
    const mocha = JSON.parse(await readFile(mochaPath, "utf8"));
    delete mocha.dark.cursor;
    await writeFile(mochaPath, JSON.stringify(mocha));
    await writeFile(join(outputDir, "catppuccin-broken.json"), "[1, 2");

    const { lines, log } = collect();
    const result = await Task.execute("validate", { outputDir }, { log });

    expect(result.success).toBe(false);
    expect(result.metadata).toMatchObject({ total: 5, valid: 3, invalid: 2 });
    expect(lines).toContain("  ✗ catppuccin-mocha.json: INVALID");
    expect(lines).toContain("    - Dark theme: Missing required field: cursor");
    expect(lines).toContain("  ✗ catppuccin-broken.json: INVALID");
    expect(lines).toContain("  ✓ catppuccin-latte.json: VALID");
    expect(lines).toContain("Total files: 5");
    expect(lines.at(-1)).toBe("Some theme files have validation errors.");
  });

  it("flags duplicate ids across files", async () => {
    await Task.execute("generate", { outputDir }, { log: () => {} });
    const latte = await readFile(join(outputDir, "catppuccin-latte.json"), "utf8");
    await writeFile(join(outputDir, "catppuccin-zzz.json"), latte);

    const { lines, log } = collect();
    const result = await Task.execute("validate", { outputDir }, { log });

    expect(result.success).toBe(false);
    expect(lines).toContain("    - Duplicate theme id: catppuccin-latte (also in catppuccin-latte.json)");
  });

  it("fails on a missing directory", async () => {
    const { lines, log } = collect();
    const result = await Task.execute("validate", { outputDir }, { log });
    expect(result.success).toBe(false);
    expect(lines).toEqual([`Error: Themes directory not found: ${outputDir}`]);
  });

  it("fails on a directory without theme files", async () => {
    await mkdir(outputDir, { recursive: true });
    await writeFile(join(outputDir, "readme.json"), "{}");
    const { lines, log } = collect();
    const result = await Task.execute("validate", { outputDir }, { log });
    expect(result.success).toBe(false);
    expect(lines).toEqual(["No catppuccin theme files found!"]);
  });

  it("titles the progress line with a custom prefix", async () => {
    const { lines, log } = collect();
    await Task.execute("generate", { outputDir, prefix: "mytheme" }, { log });
    expect(lines[0]).toBe(`Generating Mytheme theme files in ${outputDir}/...`);
    expect(lines[2]).toBe(`    Saved to ${join(outputDir, "mytheme-latte.json")}`);
  });

  it("rejects a prefix that is not a slug", async () => {
    await expect(Task.execute("generate", { outputDir, prefix: "Bad Prefix" })).rejects.toThrow();
  });
});
