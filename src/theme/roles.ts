/**
 * Role derivation rules.
 *
 * Every role maps to one rule: pass a palette entry through, render it at a fixed
 * alpha, darken it, or use the transparent literal. Rules name either a palette key
 * directly or a policy slot resolved per variant (see {@link resolveSource}).
 */

import type { DerivationPalette, PaletteKey } from "../palette";
import type { ThemeRole } from "./types";

// ── Policy ────────────────────────────────────────────────
export const POLICY = {
  accent: "blue",
  danger: "red",
  warning: "peach",
} as const satisfies Record<string, PaletteKey>;

export type PolicySlot = keyof typeof POLICY | "onAccent";
export type ColorSource = PaletteKey | PolicySlot;

export type RoleRule =
  | { kind: "palette"; source: ColorSource }
  | { kind: "alpha"; source: ColorSource; alpha: number }
  | { kind: "darken"; source: ColorSource; factor: number }
  | { kind: "transparent" };

export const HOVER_ALPHA = 0.9;
export const ACTIVE_FACTOR = 0.9;
export const SELECTED_FACTOR = 0.8;
export const DISABLED_ALPHA = 0.3;

const palette = (source: ColorSource): RoleRule => ({ kind: "palette", source });
const alpha = (source: ColorSource, value: number): RoleRule => ({ kind: "alpha", source, alpha: value });
const darken = (source: ColorSource, factor: number): RoleRule => ({ kind: "darken", source, factor });
const transparent: RoleRule = { kind: "transparent" };

/** Foreground, background and the four interaction states of an accent-filled element. */
function accentElement(source: keyof typeof POLICY) {
  return {
    foreground: palette("onAccent"),
    background: palette(source),
    hover: alpha(source, HOVER_ALPHA),
    active: darken(source, ACTIVE_FACTOR),
    selected: darken(source, SELECTED_FACTOR),
    disabled: alpha(source, DISABLED_ALPHA),
  };
}

const element = accentElement("accent");
const danger = accentElement("danger");
const warning = accentElement("warning");

export const ROLE_RULES = {
  // Surfaces
  background: palette("base"),
  surface_background: palette("mantle"),
  elevated_surface_background: palette("crust"),
  panel_background: palette("base"),
  overlay: alpha("overlay0", 0.1),
  title_bar: transparent,
  title_bar_inactive: palette("base"),
  window_border: palette("surface2"),
  // Borders
  border: palette("surface2"),
  border_variant: palette("surface1"),
  border_focused: palette("accent"),
  border_selected: palette("accent"),
  border_transparent: transparent,
  border_disabled: palette("surface0"),
  ring: palette("accent"),
  // Text
  text: palette("text"),
  text_muted: palette("subtext1"),
  text_placeholder: palette("subtext0"),
  text_accent: palette("accent"),
  // Icons
  icon: palette("text"),
  icon_muted: palette("subtext1"),
  icon_accent: palette("accent"),
  // Primary elements
  element_foreground: element.foreground,
  element_background: element.background,
  element_hover: element.hover,
  element_active: element.active,
  element_selected: element.selected,
  element_disabled: element.disabled,
  // Secondary elements
  secondary_foreground: palette("accent"),
  secondary_background: palette("surface0"),
  secondary_hover: alpha("surface1", 0.1),
  secondary_active: palette("surface1"),
  secondary_selected: palette("surface1"),
  secondary_disabled: alpha("surface0", DISABLED_ALPHA),
  // Danger elements
  danger_foreground: danger.foreground,
  danger_background: danger.background,
  danger_hover: danger.hover,
  danger_active: danger.active,
  danger_selected: danger.selected,
  danger_disabled: danger.disabled,
  // Warning elements
  warning_foreground: warning.foreground,
  warning_background: warning.background,
  warning_hover: warning.hover,
  warning_active: warning.active,
  warning_selected: warning.selected,
  warning_disabled: warning.disabled,
  // Ghost elements
  ghost_element_background: transparent,
  ghost_element_background_alt: palette("surface0"),
  ghost_element_hover: alpha("overlay0", 0.1),
  ghost_element_active: palette("surface1"),
  ghost_element_selected: palette("surface1"),
  ghost_element_disabled: alpha("overlay0", 0.05),
  // Tabs
  tab_inactive_background: palette("surface0"),
  tab_hover_background: palette("surface1"),
  tab_active_background: palette("surface2"),
  // Scrollbar
  scrollbar_thumb_background: alpha("overlay0", 0.2),
  scrollbar_thumb_hover_background: alpha("overlay0", 0.3),
  scrollbar_thumb_border: transparent,
  scrollbar_track_background: transparent,
  scrollbar_track_border: palette("surface1"),
  // Interaction
  drop_target_background: alpha("accent", 0.1),
  cursor: palette("sky"),
  selection: alpha("sky", 0.25),
} satisfies Record<ThemeRole, RoleRule>;

export function resolveSource(source: ColorSource, colors: DerivationPalette, isLight: boolean): string {
  switch (source) {
    case "accent":
    case "danger":
    case "warning":
      return colors[POLICY[source]];
    case "onAccent":
      // Text on accent fills flips with the scheme so it stays legible.
      return isLight ? colors.base : colors.text;
    default:
      return colors[source];
  }
}
