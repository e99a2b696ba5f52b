/**
 * SQL text helpers for statements assembled from tool arguments.
 *
 * Values go through bind parameters wherever the statement allows it; names of
 * databases, tables and columns cannot be bound and are quoted here instead.
 */

import { ErrorCodes, ValidationError } from './errors';

/** Double-quote an identifier, doubling embedded quotes */
export function quoteIdentifier(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Identifier must not be empty', ErrorCodes.INVALID_IDENTIFIER);
  }
  const unquoted =
    trimmed.length > 1 && trimmed.startsWith('"') && trimmed.endsWith('"')
      ? trimmed.slice(1, -1).replace(/""/g, '"')
      : trimmed;
  return `"${unquoted.replace(/"/g, '""')}"`;
}

/**
 * Quote a possibly qualified name such as `db.table`; the database part may
 * also be passed separately.
 */
export function quoteQualifiedName(name: string, database?: string): string {
  const parts = splitQualifiedName(name);
  if (database !== undefined && database.trim().length > 0 && parts.length === 1) {
    parts.unshift(database);
  }
  return parts.map(quoteIdentifier).join('.');
}

/** Single-quote a string literal */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function splitQualifiedName(name: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const char of name.trim()) {
    if (char === '"') {
      inQuotes = !inQuotes;
      current += char;
    } else if (char === '.' && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current);
  return parts;
}
