/**
 * Column readers for untyped driver rows.
 *
 * pg returns NUMERIC and COUNT(*) as strings and DATE as a local-midnight
 * Date, so every column goes through one of these.
 */

import { DatabaseError } from '../errors.js';
import type { SqlRow } from './pool.js';

export function readNumber(row: SqlRow, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'number' ? value : Number(value ?? 0);
  if (!Number.isFinite(parsed)) {
    throw new DatabaseError(`Column ${column} is not numeric: ${String(value)}`);
  }
  return parsed;
}

export function readString(row: SqlRow, column: string): string {
  const value = row[column];
  return value === null || value === undefined ? '' : String(value);
}

export function readOptionalString(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text ? text : null;
}

export function readDate(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value instanceof Date) {
    const month = String(value.getMonth() + 1).padStart(2, '0');
    const day = String(value.getDate()).padStart(2, '0');
    return `${value.getFullYear()}-${month}-${day}`;
  }
  if (typeof value === 'string' && value) {
    return value.slice(0, 10);
  }
  return null;
}

export function readTimestamp(row: SqlRow, column: string): Date | null {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string' && value) return new Date(value);
  return null;
}
