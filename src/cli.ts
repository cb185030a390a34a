import fs from "fs";
import { fileURLToPath } from "url";
import { Command, Option } from "commander";
import { COLORS, colorCode, type Color } from "./format/types.js";
import { createPainter } from "./format/colors.js";
import { ColorPolicy, COLOR_ENV_VAR, defaultPolicy } from "./policy.js";
import { validateColor, validateStyle } from "./validation.js";
import { VERSION } from "./version.js";

export const COLOR_MODES = ["always", "never", "auto"] as const;
export type ColorMode = (typeof COLOR_MODES)[number];

function modeToOverride(mode: ColorMode): boolean | null {
  if (mode === "always") {
    return true;
  }
  if (mode === "never") {
    return false;
  }
  return null;
}

export function createProgram(
  write: (text: string) => void = (t) => process.stdout.write(t + "\n"),
  policy: ColorPolicy = defaultPolicy,
): Command {
  const paint = createPainter(policy);
  const program = new Command("termtint")
    .description(
      `termtint — ANSI colors that respect the terminal\n\nColor is on when stdout is a terminal. Set ${COLOR_ENV_VAR}=0 to turn it off, or pass --color always|never to force it.`,
    )
    .version(VERSION)
    .addOption(
      new Option("--color <when>", "When to emit color codes").choices(COLOR_MODES).default("auto"),
    );

  program.configureOutput({
    writeOut: write,
    writeErr: write,
  });

  // Override exit to not actually exit during tests
  program.exitOverride();

  program.hook("preAction", () => {
    const { color } = program.opts<{ color: ColorMode }>();
    policy.force(modeToOverride(color));
  });

  function paletteRow(colors: readonly Color[]): string {
    return colors.map((c) => paint.color(`\\e[1;${colorCode(c)}m`, c).text).join("  ");
  }

  // palette
  program
    .command("palette")
    .description("Print every foreground color")
    .action(() => {
      write(paletteRow(COLORS.slice(0, 8)));
      write(paletteRow(COLORS.slice(8)));
    });

  // paint
  program
    .command("paint <color> <text...>")
    .description(`Print text in a color (${COLORS.join(", ")})`)
    .action((name: string, words: string[]) => {
      const result = validateColor(name);
      if (!result.valid) {
        write(result.message);
        process.exitCode = 1;
        return;
      }
      write(paint.color(words.join(" "), result.value).text);
    });

  // style
  program
    .command("style <style> <text...>")
    .description("Print text with a style such as bold or underline")
    .action((name: string, words: string[]) => {
      const result = validateStyle(name);
      if (!result.valid) {
        write(result.message);
        process.exitCode = 1;
        return;
      }
      write(paint.style(words.join(" "), result.value).text);
    });

  // status
  program
    .command("status")
    .description("Explain whether color is currently enabled")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      const decision = policy.resolve();
      if (opts.json) {
        write(JSON.stringify(decision));
        return;
      }
      write(`Color: ${decision.enabled ? "enabled" : "disabled"} (${decision.detail})`);
    });

  return program;
}

// Entry point when run directly
async function main() {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version, etc.
    if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") {
      process.exit(err.exitCode);
    }
    throw err;
  }
}

const currentFile = fileURLToPath(import.meta.url);
// argv[1] is the bin symlink when installed globally
const entryArg = process.argv[1];
const isEntryPoint =
  entryArg !== undefined && fs.existsSync(entryArg) && currentFile === fs.realpathSync(entryArg);

if (isEntryPoint) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
