export * from './lib/interfaces/log-store-client.interface';
export * from './lib/clients/supabase.client';
export * from './lib/log-store.service';
export * from './lib/log-query.service';
export * from './lib/log-store.module';
