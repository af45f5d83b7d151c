import {
  canTransition,
  isParticipant,
  MENTORSHIP_STATUSES,
} from './mentorship.types';

describe('canTransition', () => {
  it('pending からは active と declined にのみ遷移できること', () => {
    expect(canTransition('pending', 'active')).toBe(true);
    expect(canTransition('pending', 'declined')).toBe(true);
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('pending', 'pending')).toBe(false);
  });

  it('active からは completed にのみ遷移できること', () => {
    expect(canTransition('active', 'completed')).toBe(true);
    expect(canTransition('active', 'declined')).toBe(false);
    expect(canTransition('active', 'pending')).toBe(false);
  });

  it('completed と declined からはどの状態にも遷移できないこと', () => {
    for (const to of MENTORSHIP_STATUSES) {
      expect(canTransition('completed', to)).toBe(false);
      expect(canTransition('declined', to)).toBe(false);
    }
  });
});

describe('isParticipant', () => {
  const mentorship = { mentor_id: 'mentor-001', mentee_id: 'mentee-001' };

  it('メンターとメンティーのみを当事者とみなすこと', () => {
    expect(isParticipant(mentorship, 'mentor-001')).toBe(true);
    expect(isParticipant(mentorship, 'mentee-001')).toBe(true);
    expect(isParticipant(mentorship, 'outsider-001')).toBe(false);
  });
});
