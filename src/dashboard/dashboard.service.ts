import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { USER_PORT } from '../user/user.port';
import type { UserPort } from '../user/user.port';
import type { PublicUser } from '../user/user.types';
import { MENTORSHIP_PORT } from '../mentorship/mentorship.port';
import type { MentorshipPort } from '../mentorship/mentorship.port';
import { MentorshipService } from '../mentorship/mentorship.service';
import type { MentorshipView } from '../mentorship/mentorship.types';

export interface DashboardStats {
  totalUsers: number;
  mentorCount: number;
  menteeCount: number;
  activeMentorships: number;
}

export interface Dashboard {
  me: PublicUser;
  mentors: PublicUser[];
  mentees: PublicUser[];
  mentorships: MentorshipView[];
  stats: DashboardStats;
}

@Injectable()
export class DashboardService {
  constructor(
    @Inject(USER_PORT)
    private readonly userRepository: UserPort,
    @Inject(MENTORSHIP_PORT)
    private readonly mentorshipRepository: MentorshipPort,
    private readonly mentorshipService: MentorshipService,
  ) {}

  async getDashboard(userId: string): Promise<Dashboard> {
    const me = await this.userRepository.findById(userId);
    if (!me) {
      throw new NotFoundException(`User ${userId} not found`);
    }

    const [mentors, mentees, mentorships, activeMentorships] =
      await Promise.all([
        this.userRepository.findByRole('mentor'),
        this.userRepository.findByRole('mentee'),
        this.mentorshipService.listForUser(userId),
        this.mentorshipRepository.countByStatus('active'),
      ]);

    return {
      me: me.toPublic(),
      mentors: mentors.map((user) => user.toPublic()),
      mentees: mentees.map((user) => user.toPublic()),
      mentorships,
      stats: {
        totalUsers: mentors.length + mentees.length,
        mentorCount: mentors.length,
        menteeCount: mentees.length,
        activeMentorships,
      },
    };
  }
}
