import { Module } from '@nestjs/common';
import { LOG_STORE_CLIENT } from './interfaces/log-store-client.interface';
import { SupabaseLogStoreClient } from './clients/supabase.client';
import { LogStoreService } from './log-store.service';
import { LogQueryService } from './log-query.service';

/**
 * LogStore Module
 *
 * Exports:
 * - LOG_STORE_CLIENT token (bound to SupabaseLogStoreClient)
 * - LogStoreService (retrying writes and reads)
 * - LogQueryService (history projections)
 *
 * Expects a global ConfigModule providing `logStore.url` and `logStore.key`.
 */
@Module({
  providers: [
    {
      provide: LOG_STORE_CLIENT,
      useClass: SupabaseLogStoreClient,
    },
    LogStoreService,
    LogQueryService,
  ],
  exports: [LOG_STORE_CLIENT, LogStoreService, LogQueryService],
})
export class LogStoreModule {}
