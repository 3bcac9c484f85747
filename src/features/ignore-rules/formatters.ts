/**
 * Serializers for exported ignore rules
 */

import type { IgnoreRule } from '../teams/api/types.js';

export const OUTPUT_FORMATS = ['json', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function formatJson(rules: IgnoreRule[]): string {
  return JSON.stringify(rules, null, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nested objects become dot-separated keys; arrays stay as one JSON cell.
 */
export function flattenRecord(
  record: Record<string, unknown>,
  prefix = ''
): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    const column = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value) && Object.keys(value).length > 0) {
      Object.assign(flat, flattenRecord(value, column));
    } else {
      flat[column] = value;
    }
  }
  return flat;
}

function toCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

function escapeCsv(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

/**
 * Header row is the union of flattened keys in first-seen order; records
 * missing a column get an empty cell.
 */
export function formatCsv(rules: IgnoreRule[]): string {
  if (rules.length === 0) {
    return '';
  }

  const rows = rules.map((rule) => flattenRecord(rule));
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const lines = [columns.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsv(toCell(row[column]))).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

export function formatRules(rules: IgnoreRule[], format: OutputFormat): string {
  return format === 'csv' ? formatCsv(rules) : formatJson(rules);
}
