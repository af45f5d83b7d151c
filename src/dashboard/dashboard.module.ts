import { Module } from '@nestjs/common';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';
import { UserModule } from '../user/user.module';
import { MentorshipModule } from '../mentorship/mentorship.module';
import { SessionModule } from '../session/session.module';

@Module({
  imports: [UserModule, MentorshipModule, SessionModule],
  controllers: [DashboardController],
  providers: [DashboardService],
})
export class DashboardModule {}
