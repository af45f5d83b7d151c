import type { UserRole } from '../user/user.types';

export interface Session {
  session_id: string;
  user_id: string;
  created_at: Date;
  expires_at: Date;
  revoked_at: Date | null;
}

/**
 * セッショントークンのペイロード。
 * sub はユーザーID、sid は session テーブルの行ID。
 */
export interface SessionPayload {
  sub: string;
  sid: string;
  role: UserRole;
  iat: number;
  exp: number;
}

export interface IssuedSession {
  token: string;
  expiresAt: Date;
}
