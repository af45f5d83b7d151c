import { DuplicateEmailException } from '../../src/user/user.exceptions';
import { User } from '../../src/user/user.types';
import type { UserRole } from '../../src/user/user.types';
import type { UserPort } from '../../src/user/user.port';

export class InMemoryUserRepository implements UserPort {
  private readonly users = new Map<string, User>();

  async findById(userId: string): Promise<User | undefined> {
    return this.users.get(userId);
  }

  async findByIds(userIds: string[]): Promise<User[]> {
    return [...this.users.values()].filter((user) =>
      userIds.includes(user.user_id),
    );
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const normalized = User.normalizeEmail(email);
    return [...this.users.values()].find((user) => user.email === normalized);
  }

  async findByRole(role: UserRole): Promise<User[]> {
    return [...this.users.values()]
      .filter((user) => user.role === role)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async insert(user: User): Promise<User> {
    if (await this.findByEmail(user.email)) {
      throw new DuplicateEmailException();
    }
    this.users.set(user.user_id, user);
    return user;
  }

  async saveProfile(user: User): Promise<User | undefined> {
    if (!this.users.has(user.user_id)) {
      return undefined;
    }
    this.users.set(user.user_id, user);
    return user;
  }
}
