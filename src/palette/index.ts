import { z } from "zod";
import palettes from "./palettes.json";

const BaseHexSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, "Expected a 6-digit hex color");

export const BasePaletteSchema = z
  .object({
    // Accent colors
    rosewater: BaseHexSchema,
    flamingo: BaseHexSchema,
    pink: BaseHexSchema,
    mauve: BaseHexSchema,
    red: BaseHexSchema,
    maroon: BaseHexSchema,
    peach: BaseHexSchema,
    yellow: BaseHexSchema,
    green: BaseHexSchema,
    teal: BaseHexSchema,
    sky: BaseHexSchema,
    sapphire: BaseHexSchema,
    blue: BaseHexSchema,
    lavender: BaseHexSchema,
    // Text
    text: BaseHexSchema,
    subtext1: BaseHexSchema,
    subtext0: BaseHexSchema,
    // Overlays
    overlay2: BaseHexSchema,
    overlay1: BaseHexSchema,
    overlay0: BaseHexSchema,
    // Surfaces
    surface2: BaseHexSchema,
    surface1: BaseHexSchema,
    surface0: BaseHexSchema,
    base: BaseHexSchema,
    mantle: BaseHexSchema,
    crust: BaseHexSchema,
  })
  .strict();

export const PaletteTableSchema = z.record(BasePaletteSchema);

export type BasePalette = z.infer<typeof BasePaletteSchema>;
export type PaletteKey = keyof BasePalette;

/**
 * Palette fed to the role derivation. Same keys as a base palette, but values may
 * carry an alpha channel (the synthetic dark ramp uses translucent overlays).
 */
export type DerivationPalette = Readonly<Record<PaletteKey, string>>;

/** The one variant whose base palette is light. */
export const LIGHT_VARIANT = "latte";

const registry: ReadonlyMap<string, Readonly<BasePalette>> = new Map(
  Object.entries(PaletteTableSchema.parse(palettes)).map(([variant, palette]) => [
    variant,
    Object.freeze(palette),
  ])
);

export class Palette {
  static get(variant: string): Readonly<BasePalette> | undefined {
    return registry.get(variant);
  }

  static variants(): string[] {
    return Array.from(registry.keys());
  }

  static entries(): Array<[string, Readonly<BasePalette>]> {
    return Array.from(registry.entries());
  }

  static isLight(variant: string): boolean {
    return variant === LIGHT_VARIANT;
  }
}
