/**
 * In-process stand-in for the Supabase log store, used by specs
 */

import { LogRpc, LogTable } from '@risk-router/shared/types';
import { ILogStoreClient, LogQuery } from '../interfaces/log-store-client.interface';

type Row = Record<string, unknown>;
type RpcHandler = (params: Record<string, unknown>) => unknown;

export class InMemoryLogStoreClient implements ILogStoreClient {
  readonly tables = new Map<LogTable, Row[]>();
  readonly rpcCalls: Array<{ name: LogRpc; params: Record<string, unknown> }> = [];
  insertAttempts = 0;
  private pendingFailures = 0;
  private failure: Error = new Error('log store unavailable');
  private readonly rpcHandlers = new Map<LogRpc, RpcHandler>();
  private sequence = 0;

  /**
   * Make the next `count` inserts/selects/rpcs throw `error`
   */
  failNext(count: number, error: Error = new Error('log store unavailable')): void {
    this.pendingFailures = count;
    this.failure = error;
  }

  onRpc(name: LogRpc, handler: RpcHandler): void {
    this.rpcHandlers.set(name, handler);
  }

  seed(table: LogTable, rows: Row[]): void {
    this.tables.set(table, [...this.rows(table), ...rows]);
  }

  rows(table: LogTable): Row[] {
    return this.tables.get(table) ?? [];
  }

  async insert(table: LogTable, row: object): Promise<void> {
    this.insertAttempts++;
    this.maybeFail();
    const stamped: Row = { created_date: this.nextTimestamp(), ...row };
    this.tables.set(table, [...this.rows(table), stamped]);
  }

  async select(table: LogTable, query: LogQuery): Promise<unknown[]> {
    this.maybeFail();
    let result = this.rows(table).filter((row) =>
      Object.entries(query.eq ?? {}).every(([column, value]) => row[column] === value)
    );
    result = result.filter((row) =>
      (query.notNull ?? []).every((column) => row[column] !== null && row[column] !== undefined)
    );

    const orderBy = query.orderBy;
    if (orderBy) {
      const direction = query.ascending === false ? -1 : 1;
      result = [...result].sort(
        (a, b) => String(a[orderBy] ?? '').localeCompare(String(b[orderBy] ?? '')) * direction
      );
    }
    if (query.limit !== undefined) {
      result = result.slice(0, query.limit);
    }
    return result.map((row) => ({ ...row }));
  }

  async rpc(name: LogRpc, params: Record<string, unknown>): Promise<unknown> {
    this.maybeFail();
    this.rpcCalls.push({ name, params });
    const handler = this.rpcHandlers.get(name);
    return handler ? handler(params) : [];
  }

  private maybeFail(): void {
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      throw this.failure;
    }
  }

  private nextTimestamp(): string {
    this.sequence++;
    return new Date(Date.UTC(2025, 0, 1, 0, 0, this.sequence)).toISOString();
  }
}
