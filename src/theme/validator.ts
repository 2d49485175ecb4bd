import { z } from "zod";
import { HexColorSchema } from "../color";
import { File } from "../file";
import { REQUIRED_FAMILY_FIELDS, ThemeColorsSchema } from "./types";

export type ViolationKind = "MissingField" | "InvalidColor" | "InvalidStructure";

export interface Violation {
  kind: ViolationKind;
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  id?: string;
  name?: string;
  errors: string[];
}

// Extra keys are allowed but must still be colors.
const LenientColorsSchema = ThemeColorsSchema.catchall(HexColorSchema);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : String(JSON.stringify(value));
}

function toViolation(issue: z.ZodIssue, colors: Record<string, unknown>): Violation {
  const field = issue.path.map(String).join(".");
  if (!(field in colors)) {
    return { kind: "MissingField", field, message: `Missing required field: ${field}` };
  }
  const value = colors[field];
  return {
    kind: "InvalidColor",
    field,
    value,
    message: `Invalid hex color in ${field}: ${formatValue(value)}`,
  };
}

/** Check a role table. Never throws; an empty list means the table is valid. */
export function validateThemeColors(colors: unknown): Violation[] {
  if (!isRecord(colors)) {
    return [
      {
        kind: "InvalidStructure",
        field: "",
        value: colors,
        message: `Expected an object of colors, got ${formatValue(colors)}`,
      },
    ];
  }

  const result = LenientColorsSchema.safeParse(colors);
  if (result.success) return [];
  return result.error.issues.map((issue) => toViolation(issue, colors));
}

export function validateThemeFamily(raw: unknown): ValidationResult {
  const data = isRecord(raw) ? raw : {};
  const errors: string[] = [];

  for (const field of REQUIRED_FAMILY_FIELDS) {
    if (!(field in data)) {
      errors.push(`Missing required top-level field: ${field}`);
    }
  }
  for (const field of ["id", "name"] as const) {
    if (field in data && typeof data[field] !== "string") {
      errors.push(`Top-level field ${field} must be a string, got ${formatValue(data[field])}`);
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const id = typeof data.id === "string" ? data.id : "";
  const name = typeof data.name === "string" ? data.name : "";

  for (const violation of validateThemeColors(data.light)) {
    errors.push(`Light theme: ${violation.message}`);
  }
  for (const violation of validateThemeColors(data.dark)) {
    errors.push(`Dark theme: ${violation.message}`);
  }

  return { valid: errors.length === 0, id, name, errors };
}

/** Read, parse and validate one theme file. Read and parse failures become a single error. */
export async function validateThemeFile(path: string): Promise<ValidationResult> {
  let text: string;
  try {
    text = await File.readText(path);
  } catch (error) {
    return { valid: false, errors: [`Error reading file: ${errorMessage(error)}`] };
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return { valid: false, errors: [`Invalid JSON: ${errorMessage(error)}`] };
  }

  return validateThemeFamily(data);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
