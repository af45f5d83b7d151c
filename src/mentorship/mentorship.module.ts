import { Module } from '@nestjs/common';
import { MentorshipController } from './mentorship.controller';
import { MentorshipService } from './mentorship.service';
import { MentorshipRepository } from './repositories/mentorship.repository';
import { MENTORSHIP_PORT } from './mentorship.port';
import { UserModule } from '../user/user.module';
import { SessionModule } from '../session/session.module';

@Module({
  imports: [UserModule, SessionModule],
  controllers: [MentorshipController],
  providers: [
    MentorshipService,
    {
      provide: MENTORSHIP_PORT,
      useClass: MentorshipRepository,
    },
  ],
  exports: [MentorshipService, MENTORSHIP_PORT],
})
export class MentorshipModule {}
