import {
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { MENTORSHIP_PORT } from './mentorship.port';
import type { MentorshipPort } from './mentorship.port';
import { USER_PORT } from '../user/user.port';
import type { UserPort } from '../user/user.port';
import {
  ACTION_TARGET_STATUS,
  canTransition,
  isParticipant,
} from './mentorship.types';
import type {
  Mentorship,
  MentorshipAction,
  MentorshipView,
} from './mentorship.types';
import {
  DuplicateMentorshipException,
  InvalidTransitionException,
} from './mentorship.exceptions';
import { InvalidRoleException } from '../user/user.exceptions';
import { UnauthorizedActionException } from '../common/exceptions/domain.exception';

@Injectable()
export class MentorshipService {
  private readonly logger = new Logger(MentorshipService.name);

  constructor(
    @Inject(MENTORSHIP_PORT)
    private readonly mentorshipRepository: MentorshipPort,
    @Inject(USER_PORT)
    private readonly userRepository: UserPort,
  ) {}

  async requestMentorship(
    requesterId: string,
    input: { mentorId: string; goal: string },
  ): Promise<Mentorship> {
    const requester = await this.userRepository.findById(requesterId);
    if (!requester) {
      throw new NotFoundException(`User ${requesterId} not found`);
    }
    if (requester.role !== 'mentee') {
      throw new InvalidRoleException('Only mentees can request mentorships.');
    }
    const mentor = await this.userRepository.findById(input.mentorId);
    if (!mentor) {
      throw new NotFoundException(`Mentor ${input.mentorId} not found`);
    }
    if (mentor.role !== 'mentor') {
      throw new InvalidRoleException('Selected user is not a mentor.');
    }
    const existing = await this.mentorshipRepository.findOpenBetween(
      mentor.user_id,
      requester.user_id,
    );
    if (existing) {
      throw new DuplicateMentorshipException();
    }

    const created = await this.mentorshipRepository.create({
      mentorId: mentor.user_id,
      menteeId: requester.user_id,
      goal: input.goal.trim(),
    });
    this.logger.log(
      `Mentorship requested: mentorship=${created.mentorship_id} mentor=${created.mentor_id} mentee=${created.mentee_id}`,
    );
    return created;
  }

  accept(actorId: string, mentorshipId: string): Promise<Mentorship> {
    return this.applyAction(actorId, mentorshipId, 'accept');
  }

  decline(actorId: string, mentorshipId: string): Promise<Mentorship> {
    return this.applyAction(actorId, mentorshipId, 'decline');
  }

  complete(actorId: string, mentorshipId: string): Promise<Mentorship> {
    return this.applyAction(actorId, mentorshipId, 'complete');
  }

  async getForParticipant(
    userId: string,
    mentorshipId: string,
  ): Promise<Mentorship> {
    const mentorship = await this.mentorshipRepository.findById(mentorshipId);
    if (!mentorship) {
      throw new NotFoundException(`Mentorship ${mentorshipId} not found`);
    }
    if (!isParticipant(mentorship, userId)) {
      throw new UnauthorizedActionException(
        'You are not part of this mentorship.',
      );
    }
    return mentorship;
  }

  async listForUser(userId: string): Promise<MentorshipView[]> {
    const mentorships =
      await this.mentorshipRepository.findByParticipant(userId);
    return this.toViews(mentorships);
  }

  private async toViews(mentorships: Mentorship[]): Promise<MentorshipView[]> {
    const users = await this.userRepository.findByIds(
      mentorships.flatMap((m) => [m.mentor_id, m.mentee_id]),
    );
    const names = new Map(users.map((user) => [user.user_id, user.name]));
    return mentorships.map((mentorship) => ({
      ...mentorship,
      mentor_name: names.get(mentorship.mentor_id) ?? '',
      mentee_name: names.get(mentorship.mentee_id) ?? '',
    }));
  }

  private async applyAction(
    actorId: string,
    mentorshipId: string,
    action: MentorshipAction,
  ): Promise<Mentorship> {
    const mentorship = await this.mentorshipRepository.findById(mentorshipId);
    if (!mentorship) {
      throw new NotFoundException(`Mentorship ${mentorshipId} not found`);
    }

    // accept / decline は依頼先のメンターのみ、complete は当事者どちらでも可
    const allowed =
      action === 'complete'
        ? isParticipant(mentorship, actorId)
        : mentorship.mentor_id === actorId;
    if (!allowed) {
      throw new UnauthorizedActionException(
        action === 'complete'
          ? 'You cannot complete an unrelated mentorship.'
          : `Only the assigned mentor can ${action} this request.`,
      );
    }

    const to = ACTION_TARGET_STATUS[action];
    if (!canTransition(mentorship.status, to)) {
      throw new InvalidTransitionException(mentorship.status, to);
    }
    const updated = await this.mentorshipRepository.transition(
      mentorshipId,
      mentorship.status,
      to,
    );
    if (!updated) {
      throw new InvalidTransitionException(mentorship.status, to);
    }

    this.logger.log(
      `Mentorship ${action}: mentorship=${mentorshipId} ${mentorship.status} -> ${to} by=${actorId}`,
    );
    return updated;
  }
}
