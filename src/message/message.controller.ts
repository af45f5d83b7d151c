import { Body, Controller, Get, Param, Post, UseGuards } from '@nestjs/common';
import { SessionAuthGuard } from '../session/session-auth.guard';
import { CurrentSession } from '../common/decorators/current-session.decorator';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { UUIDSchema } from '../common/uuid';
import { MessageService } from './message.service';
import type { MessageThread } from './message.service';
import {
  createMessageSchema,
  type CreateMessageDto,
} from './dto/createMessage.dto';
import type { Message } from './message.types';
import type { SessionPayload } from '../session/session.types';

interface MessageThreadResponse {
  data: MessageThread;
}

interface CreateMessageResponse {
  data: Message;
}

@Controller('mentorships/:mentorshipId/messages')
@UseGuards(SessionAuthGuard)
export class MessageController {
  constructor(private readonly messageService: MessageService) {}

  @Get()
  async getThread(
    @CurrentSession() session: SessionPayload,
    @Param('mentorshipId', new ZodValidationPipe(UUIDSchema))
    mentorshipId: string,
  ): Promise<MessageThreadResponse> {
    const thread = await this.messageService.getThread(
      session.sub,
      mentorshipId,
    );
    return { data: thread };
  }

  @Post()
  async createMessage(
    @CurrentSession() session: SessionPayload,
    @Param('mentorshipId', new ZodValidationPipe(UUIDSchema))
    mentorshipId: string,
    @Body(new ZodValidationPipe(createMessageSchema)) body: CreateMessageDto,
  ): Promise<CreateMessageResponse> {
    const message = await this.messageService.postMessage(
      session.sub,
      mentorshipId,
      body.body,
    );
    return { data: message };
  }
}
