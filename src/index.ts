export { COLORS, STYLES, colorCode, styleCode, type Color, type Style } from "./format/types.js";
export {
  ColorPolicy,
  COLOR_ENV_VAR,
  defaultPolicy,
  force,
  isFalsyFlag,
  resolveColor,
  shouldEmitColor,
  type ColorDecision,
  type ColorOverride,
  type ColorPolicyOptions,
  type DecisionSource,
  type TtyStream,
} from "./policy.js";
export {
  ColoredText,
  applyColor,
  applyStyle,
  clear,
  createPainter,
  black,
  red,
  green,
  yellow,
  blue,
  magenta,
  cyan,
  white,
  brightBlack,
  brightRed,
  brightGreen,
  brightYellow,
  brightBlue,
  brightMagenta,
  brightCyan,
  brightWhite,
  bold,
  dim,
  italic,
  underline,
  blink,
  inverse,
  hidden,
  strikethrough,
  type Paintable,
  type Painter,
} from "./format/colors.js";
