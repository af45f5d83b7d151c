import { HttpException, HttpStatus } from '@nestjs/common';

export type DomainErrorCode =
  | 'DUPLICATE_EMAIL'
  | 'INVALID_CREDENTIALS'
  | 'INVALID_ROLE'
  | 'INVALID_TRANSITION'
  | 'UNAUTHORIZED'
  | 'DUPLICATE_MENTORSHIP';

/**
 * 画面のエラーメッセージとして返す業務エラー。
 * レスポンスボディに機械可読な code を含める。
 */
export abstract class DomainException extends HttpException {
  protected constructor(
    readonly code: DomainErrorCode,
    message: string,
    status: HttpStatus,
  ) {
    super(
      {
        statusCode: status,
        error: HttpStatus[status],
        code,
        message,
      },
      status,
    );
  }
}

/** 当事者以外による操作、または状態上許可されていない操作 */
export class UnauthorizedActionException extends DomainException {
  constructor(message = 'You are not allowed to perform this action.') {
    super('UNAUTHORIZED', message, HttpStatus.FORBIDDEN);
  }
}
