/**
 * Conversion of driver rows into the JSON envelope returned by tools.
 */

export interface ColumnInfo {
  name: string;
  type?: string | undefined;
}

export type JsonRecord = Record<string, unknown>;

/**
 * Convert driver values that JSON cannot carry
 */
export function serializeValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (Buffer.isBuffer(value)) return value.toString('hex');
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(serializeValue);
  return String(value);
}

/**
 * Zip rows with column names
 */
export function rowsToJson(columns: readonly ColumnInfo[], rows: readonly unknown[][]): JsonRecord[] {
  if (columns.length === 0 || rows.length === 0) {
    return [];
  }
  return rows.map((row) => {
    const record: JsonRecord = {};
    columns.forEach((column, index) => {
      record[column.name] = serializeValue(row[index]);
    });
    return record;
  });
}

/**
 * Standard success envelope as JSON text
 */
export function createResponse(data: unknown, metadata?: JsonRecord): string {
  const response =
    metadata !== undefined
      ? { status: 'success', metadata, results: data }
      : { status: 'success', results: data };
  return JSON.stringify(response, (_key, value: unknown) =>
    typeof value === 'bigint' || value instanceof Date ? serializeValue(value) : value,
  );
}
