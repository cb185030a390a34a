/**
 * ANSI color/style formatting.
 *
 * - Colors are emitted bold: red("hi") → \x1b[1;31mhi\x1b[0m
 * - Styles use their bare SGR code: underline("hi") → \x1b[4mhi\x1b[0m
 * - When the policy says no, text passes through with no escape codes.
 * - Values do not nest: painting a ColoredText repaints its source text.
 */

import { type ColorPolicy, defaultPolicy } from "../policy.js";
import { type Color, type Style, colorCode, styleCode } from "./types.js";

const ESC = "\x1b[";
const RESET = "\x1b[0m";

/**
 * Result of a formatting call. The decision is taken once, at construction;
 * `text` never re-checks the policy and never strips codes.
 */
export class ColoredText {
  constructor(
    readonly source: string,
    readonly text: string,
    readonly applied: Color | Style | null,
  ) {}

  get colored(): boolean {
    return this.applied !== null;
  }

  toString(): string {
    return this.text;
  }
}

export type Paintable = string | ColoredText;

function sourceOf(input: Paintable): string {
  return typeof input === "string" ? input : input.source;
}

export function applyColor(
  input: Paintable,
  color: Color,
  policy: ColorPolicy = defaultPolicy,
): ColoredText {
  const source = sourceOf(input);
  if (!policy.shouldEmitColor()) {
    return new ColoredText(source, source, null);
  }
  return new ColoredText(source, `${ESC}1;${colorCode(color)}m${source}${RESET}`, color);
}

export function applyStyle(
  input: Paintable,
  style: Style,
  policy: ColorPolicy = defaultPolicy,
): ColoredText {
  const source = sourceOf(input);
  if (!policy.shouldEmitColor()) {
    return new ColoredText(source, source, null);
  }
  return new ColoredText(source, `${ESC}${styleCode(style)}m${source}${RESET}`, style);
}

export function clear(input: Paintable): ColoredText {
  const source = sourceOf(input);
  return new ColoredText(source, source, null);
}

type PaintFn = (input: Paintable) => ColoredText;

export interface Painter {
  color(input: Paintable, color: Color): ColoredText;
  style(input: Paintable, style: Style): ColoredText;
  clear: PaintFn;

  black: PaintFn;
  red: PaintFn;
  green: PaintFn;
  yellow: PaintFn;
  blue: PaintFn;
  magenta: PaintFn;
  cyan: PaintFn;
  white: PaintFn;
  brightBlack: PaintFn;
  brightRed: PaintFn;
  brightGreen: PaintFn;
  brightYellow: PaintFn;
  brightBlue: PaintFn;
  brightMagenta: PaintFn;
  brightCyan: PaintFn;
  brightWhite: PaintFn;

  bold: PaintFn;
  dim: PaintFn;
  italic: PaintFn;
  underline: PaintFn;
  blink: PaintFn;
  inverse: PaintFn;
  hidden: PaintFn;
  strikethrough: PaintFn;
}

export function createPainter(policy: ColorPolicy = defaultPolicy): Painter {
  const c =
    (color: Color): PaintFn =>
    (t) =>
      applyColor(t, color, policy);
  const s =
    (style: Style): PaintFn =>
    (t) =>
      applyStyle(t, style, policy);

  return {
    color: (t, color) => applyColor(t, color, policy),
    style: (t, style) => applyStyle(t, style, policy),
    clear,

    black: c("black"),
    red: c("red"),
    green: c("green"),
    yellow: c("yellow"),
    blue: c("blue"),
    magenta: c("magenta"),
    cyan: c("cyan"),
    white: c("white"),
    brightBlack: c("bright-black"),
    brightRed: c("bright-red"),
    brightGreen: c("bright-green"),
    brightYellow: c("bright-yellow"),
    brightBlue: c("bright-blue"),
    brightMagenta: c("bright-magenta"),
    brightCyan: c("bright-cyan"),
    brightWhite: c("bright-white"),

    bold: s("bold"),
    dim: s("dim"),
    italic: s("italic"),
    underline: s("underline"),
    blink: s("blink"),
    inverse: s("inverse"),
    hidden: s("hidden"),
    strikethrough: s("strikethrough"),
  };
}

const painter = createPainter(defaultPolicy);

// Colors
export const black = painter.black;
export const red = painter.red;
export const green = painter.green;
export const yellow = painter.yellow;
export const blue = painter.blue;
export const magenta = painter.magenta;
export const cyan = painter.cyan;
export const white = painter.white;
export const brightBlack = painter.brightBlack;
export const brightRed = painter.brightRed;
export const brightGreen = painter.brightGreen;
export const brightYellow = painter.brightYellow;
export const brightBlue = painter.brightBlue;
export const brightMagenta = painter.brightMagenta;
export const brightCyan = painter.brightCyan;
export const brightWhite = painter.brightWhite;

// Modifiers
export const bold = painter.bold;
export const dim = painter.dim;
export const italic = painter.italic;
export const underline = painter.underline;
export const blink = painter.blink;
export const inverse = painter.inverse;
export const hidden = painter.hidden;
export const strikethrough = painter.strikethrough;
