import { describe, expect, it } from "vitest";
import { Color, InvalidColorError } from "./index";

const SAMPLES = ["#89b4fa", "#000000", "#ffffff", "#1e66f5", "#AbCdEf"];
const ALPHAS = [0, 0.05, 0.1, 0.25, 0.3, 0.5, 0.9, 1];

describe("Color.toRGBA", () => {
  it("appends the rounded alpha byte to a 6-digit color", () => {
    expect(Color.toRGBA("#89b4fa", 0.9)).toBe("#89b4fae6");
    expect(Color.toRGBA("#6c7086", 0.1)).toBe("#6c70861a");
    expect(Color.toRGBA("#89dceb", 0.25)).toBe("#89dceb40");
    expect(Color.toRGBA("#6c7086", 0.05)).toBe("#6c70860d");
  });

  it("defaults to an opaque alpha", () => {
    expect(Color.toRGBA("#1e1e2e")).toBe("#1e1e2eff");
  });

  it("accepts input without a leading hash", () => {
    expect(Color.toRGBA("313244", 0)).toBe("#31324400");
  });

  it("keeps the RGB digits and recovers alpha within one step", () => {
    for (const hex of SAMPLES) {
      for (const alpha of ALPHAS) {
        const out = Color.toRGBA(hex, alpha);
        expect(out).toHaveLength(9);
        expect(out.slice(1, 7)).toBe(hex.slice(1));
        const recovered = parseInt(out.slice(7), 16) / 255;
        expect(Math.abs(recovered - alpha)).toBeLessThanOrEqual(1 / 255);
      }
    }
  });

  it("keeps the existing alpha of an 8-digit color", () => {
    expect(Color.toRGBA("#ffffff1a", 0.9)).toBe("#ffffff1a");
    expect(Color.toRGBA("#ffffff4d")).toBe("#ffffff4d");
  });

  it("clamps alpha to the unit range", () => {
    expect(Color.toRGBA("#123456", 2)).toBe("#123456ff");
    expect(Color.toRGBA("#123456", -1)).toBe("#12345600");
  });

  it.each([NaN, Infinity, -Infinity])("rejects a non-finite alpha %s", (alpha) => {
    expect(() => Color.toRGBA("#89b4fa", alpha)).toThrow(RangeError);
  });

  it.each(["#abc", "#12345", "#1234567", "", "#gggggg", "#12345678aa"])("rejects %j", (input) => {
    expect(() => Color.toRGBA(input)).toThrow(InvalidColorError);
  });
});

describe("Color.darken", () => {
  it("scales each channel and truncates", () => {
    // 0x89=137 -> 123 (7b), 0xb4=180 -> 162 (a2), 0xfa=250 -> 225 (e1)
    expect(Color.darken("#89b4fa", 0.9)).toBe("#7ba2e1");
    // 137*0.8=109.6 -> 109 (6d), 180*0.8=144 (90), 250*0.8=200 (c8)
    expect(Color.darken("#89b4fa", 0.8)).toBe("#6d90c8");
  });

  it("defaults to a factor of 0.8", () => {
    expect(Color.darken("#89b4fa")).toBe(Color.darken("#89b4fa", 0.8));
  });

  it("drops the alpha channel", () => {
    expect(Color.darken("#ffffff1a", 0.5)).toBe("#7f7f7f");
  });

  it("clamps channels to the byte range", () => {
    expect(Color.darken("#808080", 3)).toBe("#ffffff");
    expect(Color.darken("#808080", -1)).toBe("#000000");
  });

  it.each([NaN, Infinity, -Infinity])("rejects a non-finite factor %s", (factor) => {
    expect(() => Color.darken("#89b4fa", factor)).toThrow(RangeError);
  });

  it("never brightens a channel for factors in [0, 1]", () => {
    for (const hex of SAMPLES) {
      for (const factor of [0, 0.3, 0.8, 0.9, 1]) {
        const before = Color.parse(hex);
        const after = Color.parse(Color.darken(hex, factor));
        for (const channel of ["r", "g", "b"] as const) {
          expect(after[channel]).toBeLessThanOrEqual(before[channel]);
          expect(after[channel]).toBeGreaterThanOrEqual(0);
        }
      }
    }
  });

  it.each(["#abc", "#12345", "not-a-color"])("rejects %j", (input) => {
    expect(() => Color.darken(input)).toThrow(InvalidColorError);
  });

  it("reports the offending value on the error", () => {
    try {
      Color.darken("#12345");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidColorError);
      if (error instanceof InvalidColorError) {
        expect(error.code).toBe("InvalidColor");
        expect(error.value).toBe("#12345");
        expect(error.message).toBe("Invalid hex color: #12345");
      }
    }
  });
});

describe("Color.isHex", () => {
  it.each(["#abc", "#abcd", "#aabbcc", "#aabbccdd", "#00000000"])("accepts %s", (value) => {
    expect(Color.isHex(value)).toBe(true);
  });

  it.each(["abc", "#ab", "#abcde", "#aabbccd", "#xyzxyz", "notacolor", 42, null])("rejects %j", (value) => {
    expect(Color.isHex(value)).toBe(false);
  });
});
