import type { PublicUser } from '../user/user.types';

export interface AuthResult {
  token: string;
  expiresAt: Date;
  user: PublicUser;
}
