import { Color, InvalidColorError, TRANSPARENT } from "../color";
import { Palette, type DerivationPalette, type PaletteKey } from "../palette";
import { ROLE_RULES, resolveSource, type RoleRule } from "./roles";
import { THEME_ROLES, ThemeColorsSchema, type ThemeColors, type ThemeFamily, type ThemeRole } from "./types";

export const DEFAULT_PREFIX = "catppuccin";

/**
 * Grays substituted into the light variant's palette to synthesize its dark side.
 * Accent hues stay untouched. Values are fixed, not derived from the light ramp.
 */
export const LIGHT_VARIANT_DARK_OVERRIDES = {
  base: "#1a1a1a",
  mantle: "#1f1f1f",
  crust: "#242424",
  surface0: "#262626",
  surface1: "#383838",
  surface2: "#404040",
  overlay0: "#ffffff1a",
  overlay1: "#ffffff33",
  overlay2: "#ffffff4d",
  text: "#f2f2f2",
  subtext1: "#b3b3b3",
  subtext0: "#808080",
} as const satisfies Partial<Record<PaletteKey, string>>;

function applyRule(rule: RoleRule, colors: DerivationPalette, isLight: boolean): string {
  switch (rule.kind) {
    case "transparent":
      return TRANSPARENT;
    case "palette": {
      const value = resolveSource(rule.source, colors, isLight);
      if (!Color.isHex(value)) throw new InvalidColorError(value);
      return value;
    }
    case "alpha":
      return Color.toRGBA(resolveSource(rule.source, colors, isLight), rule.alpha);
    case "darken":
      return Color.darken(resolveSource(rule.source, colors, isLight), rule.factor);
  }
}

/**
 * Map a palette onto the full role table. Throws `InvalidColorError` when a palette
 * entry feeding an alpha or darken rule is malformed.
 */
export function deriveThemeColors(palette: DerivationPalette, isLightVariant: boolean): ThemeColors {
  const entries = THEME_ROLES.map((role): [ThemeRole, string] => [
    role,
    applyRule(ROLE_RULES[role], palette, isLightVariant),
  ]);
  return ThemeColorsSchema.parse(Object.fromEntries(entries));
}

export function themeId(variant: string, prefix: string = DEFAULT_PREFIX): string {
  return `${prefix}-${variant}`;
}

export function themeFileName(variant: string, prefix: string = DEFAULT_PREFIX): string {
  return `${themeId(variant, prefix)}.json`;
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function buildThemeFamily(
  variant: string,
  palette: DerivationPalette,
  prefix: string = DEFAULT_PREFIX
): ThemeFamily {
  const id = themeId(variant, prefix);
  const name = `${capitalize(prefix)} ${capitalize(variant)}`;

  if (Palette.isLight(variant)) {
    const light = deriveThemeColors(palette, true);
    const dark = deriveThemeColors({ ...palette, ...LIGHT_VARIANT_DARK_OVERRIDES }, false);
    return { id, name, light, dark };
  }

  const colors = deriveThemeColors(palette, false);
  return { id, name, light: colors, dark: colors };
}

export interface GeneratedTheme {
  variant: string;
  family: ThemeFamily;
}

/** One family per registered variant, in registry order. */
export function generateThemeFamilies(prefix: string = DEFAULT_PREFIX): GeneratedTheme[] {
  return Palette.entries().map(([variant, palette]) => ({
    variant,
    family: buildThemeFamily(variant, palette, prefix),
  }));
}
