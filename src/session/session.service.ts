import {
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SESSION_PORT } from './session.port';
import type { SessionPort } from './session.port';
import { signSessionToken, verifySessionToken } from './session-token';
import type { IssuedSession, SessionPayload } from './session.types';
import type { UserRole } from '../user/user.types';
import { createUUID } from '../common/uuid';
import type { Env } from '../config/env';

@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    @Inject(SESSION_PORT)
    private readonly sessionRepository: SessionPort,
    private readonly config: ConfigService<Env, true>,
  ) {}

  async openSession(user: {
    user_id: string;
    role: UserRole;
  }): Promise<IssuedSession> {
    const now = Date.now();
    const ttlSeconds = this.config.get('SESSION_TTL_SECONDS', { infer: true });
    const iat = Math.floor(now / 1000);
    const exp = iat + ttlSeconds;
    const sessionId = createUUID();

    await this.sessionRepository.insert({
      session_id: sessionId,
      user_id: user.user_id,
      created_at: new Date(iat * 1000),
      expires_at: new Date(exp * 1000),
      revoked_at: null,
    });

    const token = signSessionToken(
      { sub: user.user_id, sid: sessionId, role: user.role, iat, exp },
      this.secret,
    );
    return { token, expiresAt: new Date(exp * 1000) };
  }

  async authenticate(token: string): Promise<SessionPayload> {
    const payload = verifySessionToken(token, this.secret);
    const session = await this.sessionRepository.findById(payload.sid);
    if (
      !session ||
      session.revoked_at ||
      session.user_id !== payload.sub ||
      session.expires_at.getTime() <= Date.now()
    ) {
      throw new UnauthorizedException('Session is no longer valid');
    }
    return payload;
  }

  async revoke(sessionId: string): Promise<void> {
    await this.sessionRepository.revoke(sessionId, new Date());
    this.logger.log(`Session revoked: session=${sessionId}`);
  }

  private get secret(): string {
    return this.config.get('SESSION_SECRET', { infer: true });
  }
}
