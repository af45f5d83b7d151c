import type { Session } from './session.types';

export interface SessionPort {
  insert(session: Session): Promise<void>;
  findById(sessionId: string): Promise<Session | undefined>;
  revoke(sessionId: string, revokedAt: Date): Promise<void>;
}

export const SESSION_PORT = 'SESSION_PORT';
