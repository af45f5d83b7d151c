import { HttpStatus } from '@nestjs/common';
import { DomainException } from '../common/exceptions/domain.exception';
import type { MentorshipStatus } from './mentorship.types';

export class InvalidTransitionException extends DomainException {
  constructor(
    readonly from: MentorshipStatus,
    readonly to: MentorshipStatus,
  ) {
    super(
      'INVALID_TRANSITION',
      `Mentorship cannot move from ${from} to ${to}.`,
      HttpStatus.CONFLICT,
    );
  }
}

export class DuplicateMentorshipException extends DomainException {
  constructor() {
    super(
      'DUPLICATE_MENTORSHIP',
      'You already have an open mentorship with this mentor.',
      HttpStatus.CONFLICT,
    );
  }
}
