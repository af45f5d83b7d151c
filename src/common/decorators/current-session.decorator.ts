import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import type { SessionPayload } from '../../session/session.types';

/**
 * SessionAuthGuard が request.user に載せたセッション情報を取り出す。
 * ガードなしのルートで使われた場合は 401 にする。
 */
export const CurrentSession = createParamDecorator(
  (_data: unknown, context: ExecutionContext): SessionPayload => {
    const request = context
      .switchToHttp()
      .getRequest<Request & { user?: SessionPayload }>();
    if (!request.user) {
      throw new UnauthorizedException('Not signed in');
    }
    return request.user;
  },
);
