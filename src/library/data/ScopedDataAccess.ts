import { DATA_ERRORS } from '@/config/constants';
import type { SessionContext } from '@/library/auth/types';
import { DataError, type DataErrorCode } from '@/library/errors';
import type { ClientHandle } from '@/library/supabase/client';
import { createLogger } from '@/utils/logger';

export type Row = Record<string, unknown>;

export type FilterValue = string | number | boolean | null;

/** Column equality filters; `null` matches IS NULL. */
export type Predicate = Record<string, FilterValue>;

export interface OrderBy {
  column: string;
  ascending?: boolean;
}

export interface ReadOptions {
  columns?: string;
  orderBy?: OrderBy[];
  limit?: number;
}

export interface WriteOptions {
  /** Columns returned for the affected rows. */
  columns?: string;
}

export interface RemoteFailure {
  code?: string;
  message: string;
  details?: string | null;
  hint?: string | null;
}

interface QueryResult {
  data: unknown;
  error: RemoteFailure | null;
  status: number;
}

const logger = createLogger('ScopedDataAccess');

const UNAUTHORIZED_CODES = new Set(['42501', 'PGRST301', 'PGRST302', 'PGRST303']);
const NOT_FOUND_CODES = new Set(['PGRST116', 'PGRST205', '42P01']);

export function toDataErrorCode(status: number, error: RemoteFailure): DataErrorCode {
  if (error.code && UNAUTHORIZED_CODES.has(error.code)) return 'UNAUTHORIZED';
  if (error.code && NOT_FOUND_CODES.has(error.code)) return 'NOT_FOUND';
  if (status === 0 || status === 408 || status === 429 || status >= 500) return 'TRANSIENT';
  if (status === 401 || status === 403) return 'UNAUTHORIZED';
  if (status === 404) return 'NOT_FOUND';
  return 'REJECTED';
}

function assertFiltered(predicate: Predicate) {
  if (Object.keys(predicate).length === 0) {
    throw new DataError('INVALID_REQUEST', DATA_ERRORS.INVALID_REQUEST);
  }
}

/**
 * CRUD against shared tables on behalf of the caller's session. Rows are never
 * filtered by owner here: the row-level security policy on the server decides
 * what the access token may see or change.
 */
export class ScopedDataAccess {
  constructor(private readonly client: ClientHandle) {}

  private scoped(context: SessionContext) {
    return this.client.forSession(context.requireSession());
  }

  private settle(operation: string, table: string, result: QueryResult): Row[] {
    if (result.error) {
      const code = toDataErrorCode(result.status, result.error);
      logger.warn(`${operation} ${table} failed (${result.status}):`, result.error.message);
      throw new DataError(code, DATA_ERRORS[code], result.status, { cause: result.error });
    }

    logger.debug(`${operation} ${table} -> ${result.status}`);

    if (Array.isArray(result.data)) {
      return result.data.filter((row): row is Row => typeof row === 'object' && row !== null);
    }
    return [];
  }

  private settleAffected(operation: string, table: string, result: QueryResult): Row[] {
    const rows = this.settle(operation, table, result);
    if (rows.length === 0) {
      throw new DataError('NOT_FOUND', DATA_ERRORS.NOT_FOUND, result.status);
    }
    return rows;
  }

  async create(context: SessionContext, table: string, payload: Row, options: WriteOptions = {}): Promise<Row[]> {
    const db = this.scoped(context);
    const result = await db.from(table).insert(payload).select(options.columns ?? '*');
    return this.settle('create', table, result);
  }

  async read(
    context: SessionContext,
    table: string,
    predicate: Predicate = {},
    options: ReadOptions = {}
  ): Promise<Row[]> {
    const db = this.scoped(context);
    let query = db.from(table).select(options.columns ?? '*');

    for (const [column, value] of Object.entries(predicate)) {
      query = value === null ? query.is(column, null) : query.eq(column, value);
    }
    for (const { column, ascending = true } of options.orderBy ?? []) {
      query = query.order(column, { ascending });
    }
    if (options.limit !== undefined) {
      query = query.limit(options.limit);
    }

    return this.settle('read', table, await query);
  }

  async update(
    context: SessionContext,
    table: string,
    predicate: Predicate,
    payload: Row,
    options: WriteOptions = {}
  ): Promise<Row[]> {
    const db = this.scoped(context);
    assertFiltered(predicate);
    let query = db.from(table).update(payload);

    for (const [column, value] of Object.entries(predicate)) {
      query = value === null ? query.is(column, null) : query.eq(column, value);
    }

    return this.settleAffected('update', table, await query.select(options.columns ?? '*'));
  }

  async delete(context: SessionContext, table: string, predicate: Predicate, options: WriteOptions = {}): Promise<Row[]> {
    const db = this.scoped(context);
    assertFiltered(predicate);
    let query = db.from(table).delete();

    for (const [column, value] of Object.entries(predicate)) {
      query = value === null ? query.is(column, null) : query.eq(column, value);
    }

    return this.settleAffected('delete', table, await query.select(options.columns ?? '*'));
  }
}
