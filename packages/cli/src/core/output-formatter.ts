/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  // Auto-detect columns if not provided
  const first = data[0];
  const detectedColumns = columns ?? (isRecord(first) ? Object.keys(first) : []);

  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const cell = (row: unknown, col: string): string =>
    valueToString(isRecord(row) ? row[col] : undefined);

  // Calculate column widths
  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(col, Math.max(col.length, ...data.map((row) => cell(row, col).length)));
  }
  const width = (col: string): number => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => col.padEnd(width(col))).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(width(col))).join('-|-'));

  for (const row of data) {
    lines.push(detectedColumns.map((col) => cell(row, col).padEnd(width(col))).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format a command result in the requested format
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  if (format === 'table') {
    if (Array.isArray(data)) {
      return formatTable(data);
    }
    if (isRecord(data)) {
      return formatTable([data]);
    }
  }
  return formatJSON(data);
}
