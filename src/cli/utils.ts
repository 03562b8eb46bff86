/**
 * Shared CLI Utilities
 * Colors, output sinks, error formatting, option parsing, tables
 */

import { InvalidConfigurationError, describeError } from '../core/errors';

// ---------------------------------------------------------------------------
// ANSI Colors
// ---------------------------------------------------------------------------

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
} as const;

export type ColorName = keyof typeof COLORS;

export function color(text: string, colorName: ColorName): string {
  const isColorEnabled = process.stdout.isTTY && !process.env.NO_COLOR;
  if (!isColorEnabled) return text;
  return `${COLORS[colorName]}${text}${COLORS.reset}`;
}

// Color convenience functions
export const bold = (text: string) => color(text, 'bold');
export const dim = (text: string) => color(text, 'dim');
export const success = (text: string) => color(text, 'green');
export const error = (text: string) => color(text, 'red');

// ---------------------------------------------------------------------------
// Output Sinks
// ---------------------------------------------------------------------------

/** Where commands write. Results go to `out`; diagnostics and stats go to `err`. */
export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => { process.stdout.write(line + '\n'); },
  err: (line) => { process.stderr.write(line + '\n'); },
};

// ---------------------------------------------------------------------------
// Error Formatting
// ---------------------------------------------------------------------------

export const printError = (err: unknown, output: CliOutput = consoleOutput) =>
  output.err(`${error('Error:')} ${describeError(err)}`);

// ---------------------------------------------------------------------------
// Option Parsing
// ---------------------------------------------------------------------------

/** Parse a whole-number CLI option; anything else is a configuration error. */
export function parseIntegerOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidConfigurationError(`${name} must be an integer, got '${raw}'`);
  }
  return parseInt(trimmed, 10);
}

export function parseNumberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidConfigurationError(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Table Formatting
// ---------------------------------------------------------------------------

export interface TableColumn {
  header: string;
  key: string;
  align?: 'left' | 'right';
}

const pad = (text: string, width: number, align: TableColumn['align']) =>
  align === 'right' ? text.padStart(width) : text.padEnd(width);

/** Columns sized to their widest cell, two spaces apart, with a dashed rule under the header. */
export function formatTable(columns: TableColumn[], rows: Record<string, unknown>[]): string[] {
  const cell = (row: Record<string, unknown>, key: string) => String(row[key] ?? '');
  const widths = columns.map((col) => Math.max(col.header.length, ...rows.map((row) => cell(row, col.key).length)));
  const line = (cells: string[]) => cells.map((text, i) => pad(text, widths[i] ?? 0, columns[i]?.align)).join('  ');

  return [
    bold(line(columns.map((col) => col.header))),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...rows.map((row) => line(columns.map((col) => cell(row, col.key)))),
  ];
}
