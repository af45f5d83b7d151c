import { HttpStatus } from '@nestjs/common';
import { DomainException } from '../common/exceptions/domain.exception';

export class DuplicateEmailException extends DomainException {
  constructor() {
    super(
      'DUPLICATE_EMAIL',
      'An account with that email already exists.',
      HttpStatus.CONFLICT,
    );
  }
}

export class InvalidRoleException extends DomainException {
  constructor(message = 'Please choose a valid role.') {
    super('INVALID_ROLE', message, HttpStatus.FORBIDDEN);
  }
}
