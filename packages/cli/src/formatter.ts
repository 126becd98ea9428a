/**
 * CLI output formatting with ANSI colors.
 * Colors are off when stdout is not a terminal or NO_COLOR is set.
 */

// ── ANSI Color Codes ────────────────────────────────────────────────

const RESET = "\x1b[0m";

let colorEnabled = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

function ansi(open: string) {
  return (text: string) => (colorEnabled ? `${open}${text}${RESET}` : text);
}

export const colors = {
  dim: ansi("\x1b[2m"),
  bold: ansi("\x1b[1m"),

  gray: ansi("\x1b[90m"),
  white: ansi("\x1b[37m"),

  cyan: ansi("\x1b[36m"),

  bgBlue: ansi("\x1b[44m\x1b[97m"),
  bgRed: ansi("\x1b[41m\x1b[97m"),
};

// ── Formatting Helpers ──────────────────────────────────────────────

export function heading(text: string): string {
  return colors.bold(colors.white(text));
}

export function label(text: string): string {
  return colors.gray(text);
}

export function code(text: string): string {
  return colors.cyan(text);
}

export type BadgeVariant = "info" | "critical";

/** Badge texts that mark a risky field. */
const CRITICAL_BADGES = new Set(["critical", "Unlimited approval"]);

export function badgeVariant(text: string): BadgeVariant {
  return CRITICAL_BADGES.has(text) ? "critical" : "info";
}

export function badge(text: string, variant: BadgeVariant = "info"): string {
  if (!colorEnabled) return `[${text}]`;
  const padded = ` ${text} `;
  switch (variant) {
    case "info":
      return colors.bgBlue(padded);
    case "critical":
      return colors.bgRed(padded);
  }
}

