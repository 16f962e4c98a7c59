export const ANSI = {
  reset: "\u001b[0m",
  bold: "\u001b[1m",
  dim: "\u001b[2m",
  red: "\u001b[31m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  cyan: "\u001b[36m",
} as const;

export type AnsiColor = Exclude<keyof typeof ANSI, "reset">;

export function paint(color: AnsiColor, text: string): string {
  return `${ANSI[color]}${text}${ANSI.reset}`;
}

export const ICONS = {
  pass: "✔",
  fail: "✘",
  warn: "⚠",
} as const;

/** Action-boundary error report shared by every command */
export function printError(message: string): void {
  console.error(paint("red", `Error: ${message}`));
}
