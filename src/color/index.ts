import { z } from "zod";

/** `#` followed by 3, 4, 6 or 8 hex digits. */
export const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

export const TRANSPARENT = "#00000000";

export const HexColorSchema = z.string().regex(HEX_COLOR_PATTERN, "Invalid hex color");

export const ChannelsSchema = z.object({
  r: z.number().int().min(0).max(255),
  g: z.number().int().min(0).max(255),
  b: z.number().int().min(0).max(255),
  a: z.number().int().min(0).max(255).optional(),
});

export type Channels = z.infer<typeof ChannelsSchema>;

export class InvalidColorError extends Error {
  readonly code = "InvalidColor";

  constructor(readonly value: string) {
    super(`Invalid hex color: ${value}`);
    this.name = "InvalidColorError";
  }
}

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

export class Color {
  /**
   * Split a 6 or 8 digit hex string (leading `#` optional) into channels.
   * Shorthand forms are rejected here even though {@link Color.isHex} accepts them.
   */
  static parse(hex: string): Channels {
    const digits = this.digits(hex);
    return {
      r: parseInt(digits.slice(0, 2), 16),
      g: parseInt(digits.slice(2, 4), 16),
      b: parseInt(digits.slice(4, 6), 16),
      a: digits.length === 8 ? parseInt(digits.slice(6, 8), 16) : undefined,
    };
  }

  /**
   * Append an alpha channel. An 8-digit input keeps its own alpha and `alpha` is ignored.
   */
  static toRGBA(hex: string, alpha: number = 1.0): string {
    const digits = this.digits(hex);
    if (digits.length === 8) {
      return `#${digits}`;
    }
    if (!Number.isFinite(alpha)) throw new RangeError(`Alpha must be a finite number, got ${alpha}`);
    const clamped = Math.max(0, Math.min(1, alpha));
    return `#${digits}${this.toByte(Math.round(clamped * 255))}`;
  }

  /** Scale each RGB channel by `factor` (truncating). Alpha is dropped. */
  static darken(hex: string, factor: number = 0.8): string {
    if (!Number.isFinite(factor)) throw new RangeError(`Darken factor must be a finite number, got ${factor}`);
    const { r, g, b } = this.parse(hex);
    const scale = (channel: number) => Math.max(0, Math.min(255, Math.trunc(channel * factor)));
    return `#${this.toByte(scale(r))}${this.toByte(scale(g))}${this.toByte(scale(b))}`;
  }

  static isHex(value: unknown): value is string {
    return typeof value === "string" && HEX_COLOR_PATTERN.test(value);
  }

  private static digits(hex: string): string {
    const digits = hex.startsWith("#") ? hex.slice(1) : hex;
    if ((digits.length !== 6 && digits.length !== 8) || !HEX_DIGITS.test(digits)) {
      throw new InvalidColorError(hex);
    }
    return digits;
  }

  private static toByte(value: number): string {
    return value.toString(16).padStart(2, "0");
  }
}
