export const USER_ROLES = ['mentor', 'mentee'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const isUserRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && USER_ROLES.some((role) => role === value);

export interface UserProps {
  user_id: string;
  role: UserRole;
  name: string;
  email: string;
  password_hash: string;
  bio?: string | null;
  skills?: string | null;
  availability?: string | null;
  created_at: Date | string;
}

export interface ProfilePatch {
  name?: string;
  bio?: string;
  skills?: string;
  availability?: string;
}

/** password_hash を除いた、レスポンスに載せてよいユーザー情報 */
export interface PublicUser {
  user_id: string;
  role: UserRole;
  name: string;
  email: string;
  bio: string;
  skills: string;
  availability: string;
  created_at: Date;
}

export class User {
  readonly user_id: string;
  readonly role: UserRole;
  readonly name: string;
  readonly email: string;
  readonly password_hash: string;
  readonly bio: string;
  readonly skills: string;
  readonly availability: string;
  readonly created_at: Date;

  constructor(raw: UserProps) {
    const userId = raw.user_id?.trim();
    if (!userId) {
      throw new Error('user_id is required');
    }

    if (!isUserRole(raw.role)) {
      throw new Error('role must be either mentor or mentee');
    }

    const name = raw.name?.trim();
    if (!name) {
      throw new Error('name is required');
    }

    const email = User.normalizeEmail(raw.email ?? '');
    if (!email.includes('@')) {
      throw new Error('email must be a valid address');
    }

    if (!raw.password_hash) {
      throw new Error('password_hash is required');
    }

    this.user_id = userId;
    this.role = raw.role;
    this.name = name;
    this.email = email;
    this.password_hash = raw.password_hash;
    this.bio = raw.bio ?? '';
    this.skills = raw.skills ?? '';
    this.availability = raw.availability ?? '';
    this.created_at = User.parseDate(raw.created_at, 'created_at');
  }

  static create(raw: UserProps): User {
    return new User(raw);
  }

  static normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
  }

  /**
   * 指定されたフィールドだけを差し替えた新しい User を返す。
   * undefined のフィールドは現在の値を維持する。
   */
  withProfile(patch: ProfilePatch): User {
    return User.create({
      ...this,
      name: patch.name ?? this.name,
      bio: patch.bio ?? this.bio,
      skills: patch.skills ?? this.skills,
      availability: patch.availability ?? this.availability,
    });
  }

  toPublic(): PublicUser {
    return {
      user_id: this.user_id,
      role: this.role,
      name: this.name,
      email: this.email,
      bio: this.bio,
      skills: this.skills,
      availability: this.availability,
      created_at: this.created_at,
    };
  }

  private static parseDate(value: Date | string, field: string): Date {
    const parsed = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      throw new Error(`${field} must be a valid date`);
    }
    return parsed;
  }
}
