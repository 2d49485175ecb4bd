import { ConfigSchema } from "../config";
import { File } from "../file";
import { validateThemeFile, type ValidationResult } from "../theme";
import { Task } from "./task";

const ValidateParamsSchema = ConfigSchema;

export interface FileReport extends ValidationResult {
  file: string;
}

const RULE = "=".repeat(60);

export const ValidateTask = Task.define("validate", {
  name: "Validate",
  description: "Check every generated theme file for structure and color syntax",
  parameters: ValidateParamsSchema,
  execute: async (args, context) => {
    context.setMetadata("task", "validate");
    context.setMetadata("outputDir", args.outputDir);

    const fail = (message: string) => {
      context.log(message);
      return {
        title: `Validate: ${args.outputDir}`,
        success: false,
        metadata: { reports: [], total: 0, valid: 0, invalid: 0 },
        output: message,
      };
    };

    if (!(await File.isDirectory(args.outputDir))) {
      return fail(`Error: Themes directory not found: ${args.outputDir}`);
    }

    const entries = await File.list(args.outputDir, { prefix: `${args.prefix}-`, extension: ".json" });
    if (entries.length === 0) {
      return fail(`No ${args.prefix} theme files found!`);
    }

    const lines: string[] = [];
    const emit = (line: string) => {
      lines.push(line);
      context.log(line);
    };

    emit(`Found ${entries.length} ${args.prefix} theme files:`);
    for (const entry of entries) emit(`  - ${entry.name}`);
    emit("");

    const reports: FileReport[] = [];
    const seenIds = new Map<string, string>();

    for (const entry of entries) {
      emit(`Validating ${entry.name}...`);
      const result = await validateThemeFile(entry.path);
      const report: FileReport = { ...result, file: entry.name };

      if (report.id !== undefined) {
        const owner = seenIds.get(report.id);
        if (owner) {
          report.errors = [...report.errors, `Duplicate theme id: ${report.id} (also in ${owner})`];
          report.valid = false;
        } else {
          seenIds.set(report.id, entry.name);
        }
      }
      reports.push(report);

      if (report.valid) {
        emit(`  ✓ ${entry.name}: VALID`);
        emit(`    ID: ${report.id}, Name: ${report.name}`);
      } else {
        emit(`  ✗ ${entry.name}: INVALID`);
        for (const error of report.errors) emit(`    - ${error}`);
      }
      emit("");
    }

    const valid = reports.filter((r) => r.valid).length;
    const invalid = reports.length - valid;
    const success = invalid === 0;

    emit(RULE);
    emit("VALIDATION SUMMARY");
    emit(RULE);
    emit(`Total files: ${reports.length}`);
    emit(`Valid: ${valid}`);
    emit(`Invalid: ${invalid}`);
    emit("");
    emit(success ? "All theme files are valid!" : "Some theme files have validation errors.");

    return {
      title: `Validate: ${args.outputDir}`,
      success,
      metadata: { reports, total: reports.length, valid, invalid },
      output: lines.join("\n"),
    };
  },
});
