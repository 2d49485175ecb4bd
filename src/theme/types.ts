/**
 * Theme file shapes.
 * A theme family pairs a light and a dark role table under one id.
 */

import { z } from "zod";
import { HexColorSchema } from "../color";

// ── Role table ────────────────────────────────────────────
export const ThemeColorsSchema = z.object({
  // Surfaces
  background: HexColorSchema,
  surface_background: HexColorSchema,
  elevated_surface_background: HexColorSchema,
  panel_background: HexColorSchema,
  overlay: HexColorSchema,
  title_bar: HexColorSchema,
  title_bar_inactive: HexColorSchema,
  window_border: HexColorSchema,
  // Borders
  border: HexColorSchema,
  border_variant: HexColorSchema,
  border_focused: HexColorSchema,
  border_selected: HexColorSchema,
  border_transparent: HexColorSchema,
  border_disabled: HexColorSchema,
  ring: HexColorSchema,
  // Text
  text: HexColorSchema,
  text_muted: HexColorSchema,
  text_placeholder: HexColorSchema,
  text_accent: HexColorSchema,
  // Icons
  icon: HexColorSchema,
  icon_muted: HexColorSchema,
  icon_accent: HexColorSchema,
  // Primary elements
  element_foreground: HexColorSchema,
  element_background: HexColorSchema,
  element_hover: HexColorSchema,
  element_active: HexColorSchema,
  element_selected: HexColorSchema,
  element_disabled: HexColorSchema,
  // Secondary elements
  secondary_foreground: HexColorSchema,
  secondary_background: HexColorSchema,
  secondary_hover: HexColorSchema,
  secondary_active: HexColorSchema,
  secondary_selected: HexColorSchema,
  secondary_disabled: HexColorSchema,
  // Danger elements
  danger_foreground: HexColorSchema,
  danger_background: HexColorSchema,
  danger_hover: HexColorSchema,
  danger_active: HexColorSchema,
  danger_selected: HexColorSchema,
  danger_disabled: HexColorSchema,
  // Warning elements
  warning_foreground: HexColorSchema,
  warning_background: HexColorSchema,
  warning_hover: HexColorSchema,
  warning_active: HexColorSchema,
  warning_selected: HexColorSchema,
  warning_disabled: HexColorSchema,
  // Ghost elements
  ghost_element_background: HexColorSchema,
  ghost_element_background_alt: HexColorSchema,
  ghost_element_hover: HexColorSchema,
  ghost_element_active: HexColorSchema,
  ghost_element_selected: HexColorSchema,
  ghost_element_disabled: HexColorSchema,
  // Tabs
  tab_inactive_background: HexColorSchema,
  tab_hover_background: HexColorSchema,
  tab_active_background: HexColorSchema,
  // Scrollbar
  scrollbar_thumb_background: HexColorSchema,
  scrollbar_thumb_hover_background: HexColorSchema,
  scrollbar_thumb_border: HexColorSchema,
  scrollbar_track_background: HexColorSchema,
  scrollbar_track_border: HexColorSchema,
  // Interaction
  drop_target_background: HexColorSchema,
  cursor: HexColorSchema,
  selection: HexColorSchema,
});

export type ThemeColors = z.infer<typeof ThemeColorsSchema>;
export type ThemeRole = keyof ThemeColors;

export const THEME_ROLES: readonly ThemeRole[] = ThemeColorsSchema.keyof().options;

// ── Family ────────────────────────────────────────────────
export const ThemeFamilySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    light: ThemeColorsSchema.strict(),
    dark: ThemeColorsSchema.strict(),
  })
  .strict();

export type ThemeFamily = z.infer<typeof ThemeFamilySchema>;

export const REQUIRED_FAMILY_FIELDS = ["id", "name", "light", "dark"] as const;

export type ThemeMode = "light" | "dark";

export function themeColorsFor(family: ThemeFamily, mode: ThemeMode): ThemeColors {
  return mode === "dark" ? family.dark : family.light;
}
