export * from './lib/interfaces';
export * from './lib/repositories/in-memory-session.repository';
export * from './lib/session-manager.service';
export * from './lib/session-manager.module';
