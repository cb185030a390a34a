// Zod schemas for names typed on the command line. The library itself takes
// Color and Style directly and needs no runtime checks.

import { z } from "zod";
import { COLORS, STYLES, type Color, type Style } from "./format/types.js";

export const ColorSchema = z.enum(COLORS);
export const StyleSchema = z.enum(STYLES);

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; message: string };

export function validateColor(name: string): ValidationResult<Color> {
  const parsed = ColorSchema.safeParse(name.toLowerCase());
  if (!parsed.success) {
    return {
      valid: false,
      message: `Unknown color '${name}'. Expected one of: ${COLORS.join(", ")}.`,
    };
  }
  return { valid: true, value: parsed.data };
}

export function validateStyle(name: string): ValidationResult<Style> {
  const parsed = StyleSchema.safeParse(name.toLowerCase());
  if (!parsed.success) {
    return {
      valid: false,
      message: `Unknown style '${name}'. Expected one of: ${STYLES.join(", ")}.`,
    };
  }
  return { valid: true, value: parsed.data };
}
