import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { MentorshipService } from './mentorship.service';
import { SessionAuthGuard } from '../session/session-auth.guard';
import { CurrentSession } from '../common/decorators/current-session.decorator';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { UUIDSchema } from '../common/uuid';
import {
  createMentorshipSchema,
  type CreateMentorshipDto,
} from './dto/createMentorship.dto';
import type { Mentorship, MentorshipView } from './mentorship.types';
import type { SessionPayload } from '../session/session.types';

interface MentorshipResponse {
  data: Mentorship;
}

interface MentorshipListResponse {
  data: MentorshipView[];
}

const mentorshipIdPipe = new ZodValidationPipe(UUIDSchema);

@Controller('mentorships')
@UseGuards(SessionAuthGuard)
export class MentorshipController {
  constructor(private readonly mentorshipService: MentorshipService) {}

  @Get()
  async listMine(
    @CurrentSession() session: SessionPayload,
  ): Promise<MentorshipListResponse> {
    const items = await this.mentorshipService.listForUser(session.sub);
    return { data: items };
  }

  @Post()
  async requestMentorship(
    @CurrentSession() session: SessionPayload,
    @Body(new ZodValidationPipe(createMentorshipSchema))
    body: CreateMentorshipDto,
  ): Promise<MentorshipResponse> {
    const mentorship = await this.mentorshipService.requestMentorship(
      session.sub,
      body,
    );
    return { data: mentorship };
  }

  @Get(':mentorshipId')
  async getOne(
    @CurrentSession() session: SessionPayload,
    @Param('mentorshipId', mentorshipIdPipe) mentorshipId: string,
  ): Promise<MentorshipResponse> {
    const mentorship = await this.mentorshipService.getForParticipant(
      session.sub,
      mentorshipId,
    );
    return { data: mentorship };
  }

  @Post(':mentorshipId/accept')
  @HttpCode(HttpStatus.OK)
  async accept(
    @CurrentSession() session: SessionPayload,
    @Param('mentorshipId', mentorshipIdPipe) mentorshipId: string,
  ): Promise<MentorshipResponse> {
    const mentorship = await this.mentorshipService.accept(
      session.sub,
      mentorshipId,
    );
    return { data: mentorship };
  }

  @Post(':mentorshipId/decline')
  @HttpCode(HttpStatus.OK)
  async decline(
    @CurrentSession() session: SessionPayload,
    @Param('mentorshipId', mentorshipIdPipe) mentorshipId: string,
  ): Promise<MentorshipResponse> {
    const mentorship = await this.mentorshipService.decline(
      session.sub,
      mentorshipId,
    );
    return { data: mentorship };
  }

  @Post(':mentorshipId/complete')
  @HttpCode(HttpStatus.OK)
  async complete(
    @CurrentSession() session: SessionPayload,
    @Param('mentorshipId', mentorshipIdPipe) mentorshipId: string,
  ): Promise<MentorshipResponse> {
    const mentorship = await this.mentorshipService.complete(
      session.sub,
      mentorshipId,
    );
    return { data: mentorship };
  }
}
