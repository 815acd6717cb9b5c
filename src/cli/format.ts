// =============================================================================
// CLI Format — ANSI color helpers and number formatting
// =============================================================================

import type { Money } from "../domain/money.js";

const CODES = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export type ColorName = Exclude<keyof typeof CODES, "reset" | "bold">;

export function color(name: ColorName, text: string): string {
  if (!process.stdout.isTTY) return text;
  return `${CODES[name]}${text}${CODES.reset}`;
}

export function bold(text: string): string {
  if (!process.stdout.isTTY) return text;
  return `${CODES.bold}${text}${CODES.reset}`;
}

export function formatUsd(value: Money | number): string {
  return `$${value.toFixed(6)}`;
}

export function formatTokens(value: number): string {
  return value.toLocaleString("en-US");
}

// Format elapsed time
export function formatSeconds(seconds: number): string {
  if (seconds < 1) return `${Math.round(seconds * 1000)}ms`;
  return `${seconds.toFixed(1)}s`;
}

// Box drawing for summaries
export function box(title: string, content: string): string {
  const rows = [title, ...content.split("\n")];
  const width = Math.max(...rows.map((row) => row.length));
  const rule = (left: string, right: string) => `${left}${"─".repeat(width + 2)}${right}`;
  const row = (text: string) => `│ ${text.padEnd(width)} │`;

  return [rule("┌", "┐"), row(title), rule("├", "┤"), ...rows.slice(1).map(row), rule("└", "┘")].join("\n");
}
