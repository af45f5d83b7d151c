import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import type { MessagePort } from './message.port';
import { MESSAGE_PORT } from './message.port';
import { MENTORSHIP_PORT } from '../mentorship/mentorship.port';
import type { MentorshipPort } from '../mentorship/mentorship.port';
import { USER_PORT } from '../user/user.port';
import type { UserPort } from '../user/user.port';
import { isParticipant } from '../mentorship/mentorship.types';
import type { Mentorship } from '../mentorship/mentorship.types';
import { UnauthorizedActionException } from '../common/exceptions/domain.exception';
import type { Message, MessageView } from './message.types';

export interface MessageThread {
  mentorship: Mentorship;
  messages: MessageView[];
}

@Injectable()
export class MessageService {
  private readonly logger = new Logger(MessageService.name);

  constructor(
    @Inject(MESSAGE_PORT)
    private readonly messageRepository: MessagePort,
    @Inject(MENTORSHIP_PORT)
    private readonly mentorshipRepository: MentorshipPort,
    @Inject(USER_PORT)
    private readonly userRepository: UserPort,
  ) {}

  async getThread(userId: string, mentorshipId: string): Promise<MessageThread> {
    const mentorship = await this.findMentorship(mentorshipId);
    if (!isParticipant(mentorship, userId)) {
      throw new UnauthorizedActionException(
        'You are not part of this mentorship.',
      );
    }
    const messages =
      await this.messageRepository.findAllByMentorship(mentorshipId);
    const senders = await this.userRepository.findByIds([
      mentorship.mentor_id,
      mentorship.mentee_id,
    ]);
    const names = new Map(senders.map((user) => [user.user_id, user.name]));
    return {
      mentorship,
      messages: messages.map((message) => ({
        ...message,
        sender_name: names.get(message.sender_id) ?? '',
      })),
    };
  }

  async postMessage(
    senderId: string,
    mentorshipId: string,
    body: string,
  ): Promise<Message> {
    const trimmedBody = body?.trim();
    if (!trimmedBody) {
      throw new BadRequestException('Message cannot be empty.');
    }
    const mentorship = await this.findMentorship(mentorshipId);
    if (!isParticipant(mentorship, senderId)) {
      throw new UnauthorizedActionException(
        'You are not part of this mentorship.',
      );
    }
    if (mentorship.status !== 'active') {
      throw new UnauthorizedActionException(
        `Messages can only be posted while the mentorship is active (current: ${mentorship.status}).`,
      );
    }

    const message = await this.messageRepository.createMessage({
      mentorshipId,
      senderId,
      body: trimmedBody,
    });
    this.logger.log(
      `Message posted: mentorship=${mentorshipId} msg=${message.msg_id} sender=${senderId}`,
    );
    return message;
  }

  private async findMentorship(mentorshipId: string): Promise<Mentorship> {
    const mentorship = await this.mentorshipRepository.findById(mentorshipId);
    if (!mentorship) {
      throw new NotFoundException(`Mentorship ${mentorshipId} not found`);
    }
    return mentorship;
  }
}
