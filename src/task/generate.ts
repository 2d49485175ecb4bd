import { join } from "node:path";
import { ConfigSchema } from "../config";
import { File } from "../file";
import { capitalize, generateThemeFamilies, themeFileName } from "../theme";
import { Task } from "./task";

const GenerateParamsSchema = ConfigSchema;

export const GenerateTask = Task.define("generate", {
  name: "Generate",
  description: "Write one theme family file per palette variant",
  parameters: GenerateParamsSchema,
  execute: async (args, context) => {
    context.setMetadata("task", "generate");
    context.setMetadata("outputDir", args.outputDir);

    await File.ensureDir(args.outputDir);
    context.log(`Generating ${capitalize(args.prefix)} theme files in ${args.outputDir}/...`);

    // Derive every family before writing any file.
    const generated = generateThemeFamilies(args.prefix);
    const files: string[] = [];

    for (const { variant, family } of generated) {
      context.log(`  Generating ${variant} theme...`);

      const file = join(args.outputDir, themeFileName(variant, args.prefix));
      await File.writeJson(file, family);
      files.push(file);

      context.log(`    Saved to ${file}`);
    }

    const output = ["", "Done! Generated theme files:", ...files.map((f) => `  - ${f}`)];
    for (const line of output) context.log(line);

    return {
      title: `Generate: ${files.length} themes`,
      success: true,
      metadata: { files, count: files.length },
      output: output.join("\n"),
    };
  },
});
