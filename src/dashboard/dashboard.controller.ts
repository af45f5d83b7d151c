import { Controller, Get, UseGuards } from '@nestjs/common';
import { DashboardService } from './dashboard.service';
import type { Dashboard } from './dashboard.service';
import { SessionAuthGuard } from '../session/session-auth.guard';
import { CurrentSession } from '../common/decorators/current-session.decorator';
import type { SessionPayload } from '../session/session.types';

@Controller('dashboard')
@UseGuards(SessionAuthGuard)
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get()
  async getDashboard(
    @CurrentSession() session: SessionPayload,
  ): Promise<{ data: Dashboard }> {
    const dashboard = await this.dashboardService.getDashboard(session.sub);
    return { data: dashboard };
  }
}
