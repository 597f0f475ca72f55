/**
 * ANSI helpers for terminal output. Colors are dropped when stdout is not a
 * terminal or NO_COLOR is set.
 */

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";

export function useColor(): boolean {
  return Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined;
}

function paint(code: string, text: string): string {
  return useColor() ? `${code}${text}${RESET}` : text;
}

export function bold(text: string): string {
  return paint(BOLD, text);
}

export function dim(text: string): string {
  return paint(DIM, text);
}

export function cyan(text: string): string {
  return paint(CYAN, text);
}

export function yellow(text: string): string {
  return paint(YELLOW, text);
}
