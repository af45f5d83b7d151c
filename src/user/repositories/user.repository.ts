import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { User, USER_ROLES } from '../user.types';
import type { UserRole } from '../user.types';
import type { UserPort } from '../user.port';
import { DuplicateEmailException } from '../user.exceptions';
import {
  isUniqueViolation,
  SUPABASE_ADMIN_CLIENT,
} from '../../supabase/adminClient';
import type { SupabaseAdminClient } from '../../supabase/adminClient';

const userRowSchema = z.object({
  user_id: z.string(),
  role: z.enum(USER_ROLES),
  name: z.string(),
  email: z.string(),
  password_hash: z.string(),
  bio: z.string().nullable(),
  skills: z.string().nullable(),
  availability: z.string().nullable(),
  created_at: z.string(),
});

type UserRow = z.infer<typeof userRowSchema>;

@Injectable()
export class UserRepository implements UserPort {
  constructor(
    @Inject(SUPABASE_ADMIN_CLIENT)
    private readonly supabase: SupabaseAdminClient,
  ) {}

  async findById(userId: string): Promise<User | undefined> {
    const { data, error } = await this.supabase
      .from('user')
      .select()
      .eq('user_id', userId)
      .maybeSingle();
    if (error) {
      throw error;
    }
    return data ? this.toUser(data) : undefined;
  }

  async findByIds(userIds: string[]): Promise<User[]> {
    const uniqueIds = Array.from(new Set(userIds));
    if (!uniqueIds.length) {
      return [];
    }
    const { data, error } = await this.supabase
      .from('user')
      .select()
      .in('user_id', uniqueIds);
    if (error || !data) {
      throw error ?? new Error('Failed to fetch users.');
    }
    return data.map((row) => this.toUser(row));
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const { data, error } = await this.supabase
      .from('user')
      .select()
      .eq('email', User.normalizeEmail(email))
      .maybeSingle();
    if (error) {
      throw error;
    }
    return data ? this.toUser(data) : undefined;
  }

  async findByRole(role: UserRole): Promise<User[]> {
    const { data, error } = await this.supabase
      .from('user')
      .select()
      .eq('role', role)
      .order('name', { ascending: true });
    if (error || !data) {
      throw error ?? new Error('Failed to fetch users.');
    }
    return data.map((row) => this.toUser(row));
  }

  async insert(user: User): Promise<User> {
    const payload: UserRow = {
      user_id: user.user_id,
      role: user.role,
      name: user.name,
      email: user.email,
      password_hash: user.password_hash,
      bio: user.bio,
      skills: user.skills,
      availability: user.availability,
      created_at: user.created_at.toISOString(),
    };
    const { data, error } = await this.supabase
      .from('user')
      .insert(payload)
      .select()
      .single();
    if (isUniqueViolation(error)) {
      throw new DuplicateEmailException();
    }
    if (error || !data) {
      throw error ?? new Error('Failed to create user.');
    }
    return this.toUser(data);
  }

  async saveProfile(user: User): Promise<User | undefined> {
    const { data, error } = await this.supabase
      .from('user')
      .update({
        name: user.name,
        bio: user.bio,
        skills: user.skills,
        availability: user.availability,
      })
      .eq('user_id', user.user_id)
      .select()
      .maybeSingle();
    if (error) {
      throw error;
    }
    return data ? this.toUser(data) : undefined;
  }

  private toUser(row: unknown): User {
    return User.create(userRowSchema.parse(row));
  }
}
