import { LogRpc, LogTable } from '@risk-router/shared/types';

/**
 * Injection token for ILogStoreClient
 * Use this token when injecting the client via @Inject()
 */
export const LOG_STORE_CLIENT = 'LOG_STORE_CLIENT';

export interface LogQuery {
  columns?: string;
  /** Equality filters, ANDed */
  eq?: Record<string, string>;
  /** Columns that must not be null */
  notNull?: string[];
  orderBy?: string;
  ascending?: boolean;
  limit?: number;
}

/**
 * Structured access to the log tables and stored procedures.
 * Implementations throw on failure; retries live in LogStoreService.
 */
export interface ILogStoreClient {
  insert(table: LogTable, row: object): Promise<void>;
  select(table: LogTable, query: LogQuery): Promise<unknown[]>;
  rpc(name: LogRpc, params: Record<string, unknown>): Promise<unknown>;
}
