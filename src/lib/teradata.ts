/**
 * Teradata database access
 *
 * Tools talk to the database through the SqlConnection port. The default
 * connector loads the `teradatasql` driver at run time; its module shape is
 * checked before use so a missing or incompatible driver is reported as a
 * DatabaseError rather than a crash. The driver's `connectAsync`,
 * `executeAsync` and `closeAsync` are preferred when it exposes them.
 */

import type { Logger } from './logger';
import type { ConnectionSettings } from './database-uri';
import { ConfigurationError, DatabaseError, ErrorCodes, errorMessage } from './errors';
import type { ColumnInfo } from './serialize';

export interface QueryResult {
  columns: ColumnInfo[];
  rows: unknown[][];
}

export interface ExecuteResult {
  rowCount: number;
}

export interface SqlConnection {
  query(sql: string, params?: readonly unknown[]): Promise<QueryResult>;
  execute(sql: string, params?: readonly unknown[]): Promise<ExecuteResult>;
  close(): Promise<void>;
}

export type Connector = (settings: ConnectionSettings) => Promise<SqlConnection>;

/**
 * Owns the current connection and reopens it on demand
 */
export class TeradataClient {
  private current: SqlConnection | undefined;
  private pending: Promise<SqlConnection> | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly settings: ConnectionSettings | undefined,
    private readonly connector: Connector,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'TeradataClient' });
  }

  get isConnected(): boolean {
    return this.current !== undefined;
  }

  /**
   * Current connection, opened first if none is held
   */
  async connection(): Promise<SqlConnection> {
    if (this.current) {
      return this.current;
    }
    if (!this.pending) {
      this.logger.info('Initializing database connection');
      this.pending = this.open().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  async reconnect(): Promise<SqlConnection> {
    await this.close();
    return this.connection();
  }

  async close(): Promise<void> {
    const connection = this.current;
    this.current = undefined;
    if (!connection) {
      return;
    }
    try {
      await connection.close();
      this.logger.info('Database connection closed');
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Error closing database connection');
    }
  }

  private async open(): Promise<SqlConnection> {
    if (!this.settings) {
      throw new ConfigurationError('DATABASE_URI is not set; cannot connect to Teradata');
    }
    try {
      const connection = await this.connector(this.settings);
      this.current = connection;
      this.logger.info(
        { host: this.settings.host, database: this.settings.database },
        'Connected to Teradata',
      );
      return connection;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Unable to connect to Teradata');
      if (error instanceof DatabaseError) {
        throw error;
      }
      throw new DatabaseError(
        `Unable to connect to Teradata: ${errorMessage(error)}`,
        ErrorCodes.DATABASE_CONNECTION_FAILED,
        { host: this.settings.host },
        error instanceof Error ? error : undefined,
      );
    }
  }
}

// ------------------------------------------------------------------
// teradatasql driver adapter
// ------------------------------------------------------------------

const DRIVER_MODULE = 'teradatasql';

interface DriverCursor {
  execute(sql: string, params?: unknown[]): unknown;
  executeAsync?: (sql: string, params?: unknown[]) => unknown;
  fetchall(): unknown;
  close(): unknown;
  description: unknown;
  rowcount: unknown;
}

interface DriverConnection {
  cursor(): unknown;
  close(): unknown;
  closeAsync?: () => unknown;
}

interface DriverModule {
  connect(params: Record<string, string>): unknown;
  connectAsync?: (params: Record<string, string>) => unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isDriverModule(value: unknown): value is DriverModule {
  return isRecord(value) && typeof value.connect === 'function';
}

function isDriverConnection(value: unknown): value is DriverConnection {
  return isRecord(value) && typeof value.cursor === 'function' && typeof value.close === 'function';
}

function isDriverCursor(value: unknown): value is DriverCursor {
  return (
    isRecord(value) &&
    typeof value.execute === 'function' &&
    typeof value.fetchall === 'function' &&
    typeof value.close === 'function'
  );
}

/**
 * Pick the driver's exports from an imported namespace (CommonJS modules
 * arrive under `default`)
 */
export function resolveDriverModule(namespace: unknown): DriverModule {
  if (isDriverModule(namespace)) {
    return namespace;
  }
  if (isRecord(namespace) && isDriverModule(namespace.default)) {
    return namespace.default;
  }
  throw new DatabaseError(
    `Module "${DRIVER_MODULE}" does not expose connect()`,
    ErrorCodes.DATABASE_DRIVER_UNAVAILABLE,
  );
}

export function toConnectParams(settings: ConnectionSettings): Record<string, string> {
  const params: Record<string, string> = {
    host: settings.host,
    user: settings.user,
    password: settings.password,
  };
  if (settings.port !== undefined) params.dbs_port = String(settings.port);
  if (settings.database !== undefined) params.database = settings.database;
  if (settings.logmech !== undefined) params.logmech = settings.logmech;
  return params;
}

function describeColumns(description: unknown): ColumnInfo[] {
  if (!Array.isArray(description)) {
    return [];
  }
  return description.map((entry: unknown, index) => {
    if (Array.isArray(entry)) {
      const typeCode: unknown = entry[1];
      return {
        name: String(entry[0] ?? `column_${index + 1}`),
        type: typeof typeCode === 'string' ? typeCode : undefined,
      };
    }
    return { name: String(entry) };
  });
}

function toRows(value: unknown): unknown[][] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((row: unknown) => (Array.isArray(row) ? row : [row]));
}

/**
 * Driver activity count; the driver reports it as a bigint
 */
export function toRowCount(value: unknown): number {
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Run a statement, preferring the driver's non-blocking entry point
 */
async function runStatement(
  cursor: DriverCursor,
  sql: string,
  params: readonly unknown[] | undefined,
): Promise<void> {
  const args = params ? [...params] : undefined;
  if (typeof cursor.executeAsync === 'function') {
    await cursor.executeAsync(sql, args);
    return;
  }
  cursor.execute(sql, args);
}

/**
 * Wrap a driver connection in the SqlConnection port
 */
export function adaptDriverConnection(handle: unknown): SqlConnection {
  if (!isDriverConnection(handle)) {
    throw new DatabaseError(
      'Driver returned an unexpected connection object',
      ErrorCodes.DATABASE_DRIVER_UNAVAILABLE,
    );
  }
  const connection: DriverConnection = handle;

  const withCursor = async <T>(work: (cursor: DriverCursor) => Promise<T>): Promise<T> => {
    const cursor = connection.cursor();
    if (!isDriverCursor(cursor)) {
      throw new DatabaseError(
        'Driver returned an unexpected cursor object',
        ErrorCodes.DATABASE_DRIVER_UNAVAILABLE,
      );
    }
    try {
      return await work(cursor);
    } finally {
      cursor.close();
    }
  };

  return {
    query(sql, params) {
      return withCursor(async (cursor) => {
        await runStatement(cursor, sql, params);
        const columns = describeColumns(cursor.description);
        return { columns, rows: columns.length > 0 ? toRows(cursor.fetchall()) : [] };
      });
    },
    execute(sql, params) {
      return withCursor(async (cursor) => {
        await runStatement(cursor, sql, params);
        return { rowCount: toRowCount(cursor.rowcount) };
      });
    },
    async close() {
      if (typeof connection.closeAsync === 'function') {
        await connection.closeAsync();
        return;
      }
      connection.close();
    },
  };
}

/**
 * Connector backed by the `teradatasql` package
 */
export function createTeradataSqlConnector(
  loadModule: () => Promise<unknown> = async () => {
    const specifier: string = DRIVER_MODULE;
    const namespace: unknown = await import(specifier);
    return namespace;
  },
): Connector {
  return async (settings) => {
    let driver: DriverModule;
    try {
      driver = resolveDriverModule(await loadModule());
    } catch (error) {
      if (error instanceof DatabaseError) {
        throw error;
      }
      throw new DatabaseError(
        `Teradata driver "${DRIVER_MODULE}" is not installed: ${errorMessage(error)}`,
        ErrorCodes.DATABASE_DRIVER_UNAVAILABLE,
      );
    }
    const params = toConnectParams(settings);
    const handle: unknown =
      typeof driver.connectAsync === 'function'
        ? await driver.connectAsync(params)
        : driver.connect(params);
    return adaptDriverConnection(handle);
  };
}
