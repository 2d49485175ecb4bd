export {
  THEME_ROLES,
  ThemeColorsSchema,
  ThemeFamilySchema,
  themeColorsFor,
  type ThemeColors,
  type ThemeFamily,
  type ThemeMode,
  type ThemeRole,
} from "./types";
export { ROLE_RULES, POLICY, type RoleRule, type ColorSource } from "./roles";
export {
  DEFAULT_PREFIX,
  LIGHT_VARIANT_DARK_OVERRIDES,
  buildThemeFamily,
  capitalize,
  deriveThemeColors,
  generateThemeFamilies,
  themeFileName,
  themeId,
  type GeneratedTheme,
} from "./generator";
export {
  validateThemeColors,
  validateThemeFamily,
  validateThemeFile,
  type ValidationResult,
  type Violation,
  type ViolationKind,
} from "./validator";
export { ThemeRegistry, type LoadFailure } from "./registry";
