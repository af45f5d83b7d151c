import { Module } from '@nestjs/common';
import { SessionService } from './session.service';
import { SessionAuthGuard } from './session-auth.guard';
import { SessionRepository } from './repositories/session.repository';
import { SESSION_PORT } from './session.port';

@Module({
  providers: [
    SessionService,
    SessionAuthGuard,
    {
      provide: SESSION_PORT,
      useClass: SessionRepository,
    },
  ],
  exports: [SessionService, SessionAuthGuard],
})
export class SessionModule {}
