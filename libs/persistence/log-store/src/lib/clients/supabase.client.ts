/**
 * Supabase Client
 * Lazily created process-wide singleton
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { LogRpc, LogTable } from '@risk-router/shared/types';
import { LogStoreError, LogStoreNotConfiguredError } from '@risk-router/shared/utils';
import { ILogStoreClient, LogQuery } from '../interfaces/log-store-client.interface';

let supabaseInstance: SupabaseClient | null = null;

/**
 * Get the Supabase client instance, creating it on first use
 */
export function getSupabase(url?: string, key?: string): SupabaseClient {
  if (!supabaseInstance) {
    if (!url || !key) {
      throw new LogStoreNotConfiguredError();
    }

    supabaseInstance = createClient(url, key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  return supabaseInstance;
}

/**
 * Reset client (for testing)
 */
export function resetSupabase(): void {
  supabaseInstance = null;
}

@Injectable()
export class SupabaseLogStoreClient implements ILogStoreClient {
  constructor(private readonly configService: ConfigService) {}

  private get client(): SupabaseClient {
    return getSupabase(
      this.configService.get<string>('logStore.url'),
      this.configService.get<string>('logStore.key')
    );
  }

  async insert(table: LogTable, row: object): Promise<void> {
    const { error } = await this.client.from(table).insert(row);
    if (error) {
      throw new LogStoreError(error.message, `insert:${table}`, { context: { code: error.code } });
    }
  }

  async select(table: LogTable, query: LogQuery): Promise<unknown[]> {
    let builder = this.client.from(table).select(query.columns ?? '*');

    for (const [column, value] of Object.entries(query.eq ?? {})) {
      builder = builder.eq(column, value);
    }
    for (const column of query.notNull ?? []) {
      builder = builder.not(column, 'is', null);
    }
    if (query.orderBy) {
      builder = builder.order(query.orderBy, { ascending: query.ascending ?? true });
    }
    if (query.limit !== undefined) {
      builder = builder.limit(query.limit);
    }

    const { data, error } = await builder;
    if (error) {
      throw new LogStoreError(error.message, `select:${table}`, { context: { code: error.code } });
    }
    return Array.isArray(data) ? data : [];
  }

  async rpc(name: LogRpc, params: Record<string, unknown>): Promise<unknown> {
    const { data, error } = await this.client.rpc(name, params);
    if (error) {
      throw new LogStoreError(error.message, `rpc:${name}`, { context: { code: error.code } });
    }
    return data;
  }
}
