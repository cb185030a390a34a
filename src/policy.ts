export const COLOR_ENV_VAR = "TERM_COLOR";

const FALSY_FLAGS = new Set<string>(["", "0", "false", "no"]);

export type ColorOverride = "on" | "off" | "auto";
export type DecisionSource = "override" | "env" | "tty";

export interface ColorDecision {
  enabled: boolean;
  source: DecisionSource;
  detail: string;
}

export interface TtyStream {
  isTTY?: boolean;
}

export interface ColorPolicyOptions {
  env?: Record<string, string | undefined>;
  stream?: TtyStream;
}

// Only the exact tokens count: " " or "off" are truthy.
export function isFalsyFlag(value: string): boolean {
  return FALSY_FLAGS.has(value.toLowerCase());
}

/**
 * Decides whether ANSI codes should be emitted.
 *
 * Precedence: forced override, then a falsy TERM_COLOR, then whether the
 * stream is a TTY. The environment and stream are read on every call, so
 * changes to process.env take effect immediately.
 */
export class ColorPolicy {
  private override: ColorOverride = "auto";
  private readonly env: Record<string, string | undefined>;
  private readonly stream: TtyStream;

  constructor(options: ColorPolicyOptions = {}) {
    this.env = options.env ?? process.env;
    this.stream = options.stream ?? process.stdout;
  }

  /**
   * `true` forces color on, `false` forces it off, `null` or no argument
   * returns to automatic detection. Never touches the environment.
   */
  force(value?: boolean | null): void {
    if (value === true) {
      this.override = "on";
    } else if (value === false) {
      this.override = "off";
    } else {
      this.override = "auto";
    }
  }

  getOverride(): ColorOverride {
    return this.override;
  }

  resolve(): ColorDecision {
    const override = this.override;
    if (override === "on") {
      return { enabled: true, source: "override", detail: "forced on" };
    }
    if (override === "off") {
      return { enabled: false, source: "override", detail: "forced off" };
    }

    const flag = this.env[COLOR_ENV_VAR];
    if (flag !== undefined && isFalsyFlag(flag)) {
      return { enabled: false, source: "env", detail: `${COLOR_ENV_VAR}=${flag}` };
    }

    if (this.stream.isTTY === true) {
      return { enabled: true, source: "tty", detail: "stdout is a terminal" };
    }
    return { enabled: false, source: "tty", detail: "stdout is not a terminal" };
  }

  shouldEmitColor(): boolean {
    return this.resolve().enabled;
  }
}

export const defaultPolicy = new ColorPolicy();

export function force(value?: boolean | null): void {
  defaultPolicy.force(value);
}

export function shouldEmitColor(): boolean {
  return defaultPolicy.shouldEmitColor();
}

export function resolveColor(): ColorDecision {
  return defaultPolicy.resolve();
}
