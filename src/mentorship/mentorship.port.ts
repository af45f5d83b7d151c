import type { Mentorship, MentorshipStatus } from './mentorship.types';

export interface MentorshipPort {
  findById(mentorshipId: string): Promise<Mentorship | undefined>;
  /** mentor または mentee として参加しているものを新しい順に返す */
  findByParticipant(userId: string): Promise<Mentorship[]>;
  findOpenBetween(
    mentorId: string,
    menteeId: string,
  ): Promise<Mentorship | undefined>;
  create(input: {
    mentorId: string;
    menteeId: string;
    goal: string;
  }): Promise<Mentorship>;
  /**
   * status が from のままの場合に限り to へ更新する。
   * 他のリクエストが先に遷移させていた場合は undefined を返す。
   */
  transition(
    mentorshipId: string,
    from: MentorshipStatus,
    to: MentorshipStatus,
  ): Promise<Mentorship | undefined>;
  countByStatus(status: MentorshipStatus): Promise<number>;
}

export const MENTORSHIP_PORT = 'MENTORSHIP_PORT';
