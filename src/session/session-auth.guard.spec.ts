import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { SessionAuthGuard } from './session-auth.guard';
import type { SessionService } from './session.service';
import type { SessionPayload } from './session.types';

describe('SessionAuthGuard', () => {
  const payload: SessionPayload = {
    sub: 'user-001',
    sid: 'session-001',
    role: 'mentee',
    iat: 1,
    exp: 2,
  };

  const createContext = (request: {
    headers: Record<string, string | undefined>;
    user?: SessionPayload;
  }): ExecutionContext => {
    const context: Pick<ExecutionContext, 'switchToHttp'> = {
      switchToHttp: () => ({
        getRequest: <T>() => request as T,
        getResponse: <T>() => ({}) as T,
        getNext: <T>() => (() => undefined) as T,
      }),
    };
    return context as ExecutionContext;
  };

  let authenticate: jest.Mock;
  let guard: SessionAuthGuard;

  beforeEach(() => {
    authenticate = jest.fn().mockResolvedValue(payload);
    const sessionService: Pick<SessionService, 'authenticate'> = {
      authenticate,
    };
    guard = new SessionAuthGuard(sessionService as SessionService);
  });

  it('Authorization ヘッダーがない場合は 401 にすること', async () => {
    const context = createContext({ headers: {} });

    await expect(guard.canActivate(context)).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
    expect(authenticate).not.toHaveBeenCalled();
  });

  it('Bearer 以外のスキームは 401 にすること', async () => {
    const context = createContext({
      headers: { authorization: 'Basic dXNlcjpwYXNz' },
    });

    await expect(guard.canActivate(context)).rejects.toThrow(
      'Missing Authorization header',
    );
  });

  it('検証済みのペイロードを request.user に設定すること', async () => {
    const request: {
      headers: Record<string, string | undefined>;
      user?: SessionPayload;
    } = { headers: { authorization: 'Bearer  token-value ' } };

    await expect(guard.canActivate(createContext(request))).resolves.toBe(true);
    expect(authenticate).toHaveBeenCalledWith('token-value');
    expect(request.user).toEqual(payload);
  });
});
