import type { User, UserRole } from './user.types';

export interface UserPort {
  findById(userId: string): Promise<User | undefined>;
  findByIds(userIds: string[]): Promise<User[]>;
  findByEmail(email: string): Promise<User | undefined>;
  findByRole(role: UserRole): Promise<User[]>;
  insert(user: User): Promise<User>;
  saveProfile(user: User): Promise<User | undefined>;
}

export const USER_PORT = 'USER_PORT';
