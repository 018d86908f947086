import { Module } from '@nestjs/common';
import { SESSION_REPOSITORY } from './interfaces';
import { InMemorySessionRepository } from './repositories/in-memory-session.repository';
import { SessionManagerService } from './session-manager.service';

/**
 * SessionManager Module
 *
 * Exports:
 * - SESSION_REPOSITORY token (bound to InMemorySessionRepository)
 * - SessionManagerService
 */
@Module({
  providers: [
    {
      provide: SESSION_REPOSITORY,
      useClass: InMemorySessionRepository,
    },
    SessionManagerService,
  ],
  exports: [SESSION_REPOSITORY, SessionManagerService],
})
export class SessionManagerModule {}
