export const MENTORSHIP_STATUSES = [
  'pending',
  'active',
  'declined',
  'completed',
] as const;
export type MentorshipStatus = (typeof MENTORSHIP_STATUSES)[number];

/** 状態遷移は単調。declined と completed は終端状態 */
export const MENTORSHIP_TRANSITIONS: Readonly<
  Record<MentorshipStatus, readonly MentorshipStatus[]>
> = {
  pending: ['active', 'declined'],
  active: ['completed'],
  declined: [],
  completed: [],
};

export const OPEN_MENTORSHIP_STATUSES: readonly MentorshipStatus[] = [
  'pending',
  'active',
];

export type MentorshipAction = 'accept' | 'decline' | 'complete';

export const ACTION_TARGET_STATUS: Readonly<
  Record<MentorshipAction, MentorshipStatus>
> = {
  accept: 'active',
  decline: 'declined',
  complete: 'completed',
};

export const canTransition = (
  from: MentorshipStatus,
  to: MentorshipStatus,
): boolean => MENTORSHIP_TRANSITIONS[from].includes(to);

export interface Mentorship {
  mentorship_id: string;
  mentor_id: string;
  mentee_id: string;
  goal: string;
  status: MentorshipStatus;
  created_at: Date;
  updated_at: Date;
}

export interface MentorshipView extends Mentorship {
  mentor_name: string;
  mentee_name: string;
}

export const isParticipant = (
  mentorship: Pick<Mentorship, 'mentor_id' | 'mentee_id'>,
  userId: string,
): boolean =>
  mentorship.mentor_id === userId || mentorship.mentee_id === userId;
