import type { Session } from '../../src/session/session.types';
import type { SessionPort } from '../../src/session/session.port';

export class InMemorySessionRepository implements SessionPort {
  private readonly sessions = new Map<string, Session>();

  async insert(session: Session): Promise<void> {
    this.sessions.set(session.session_id, { ...session });
  }

  async findById(sessionId: string): Promise<Session | undefined> {
    return this.sessions.get(sessionId);
  }

  async revoke(sessionId: string, revokedAt: Date): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (session && !session.revoked_at) {
      this.sessions.set(sessionId, { ...session, revoked_at: revokedAt });
    }
  }
}
