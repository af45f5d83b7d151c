import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import {
  MENTORSHIP_STATUSES,
  OPEN_MENTORSHIP_STATUSES,
} from '../mentorship.types';
import type { Mentorship, MentorshipStatus } from '../mentorship.types';
import type { MentorshipPort } from '../mentorship.port';
import { createUUID } from '../../common/uuid';
import { DuplicateMentorshipException } from '../mentorship.exceptions';
import {
  isUniqueViolation,
  SUPABASE_ADMIN_CLIENT,
} from '../../supabase/adminClient';
import type { SupabaseAdminClient } from '../../supabase/adminClient';

const mentorshipRowSchema = z.object({
  mentorship_id: z.string(),
  mentor_id: z.string(),
  mentee_id: z.string(),
  goal: z.string(),
  status: z.enum(MENTORSHIP_STATUSES),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

@Injectable()
export class MentorshipRepository implements MentorshipPort {
  constructor(
    @Inject(SUPABASE_ADMIN_CLIENT)
    private readonly supabase: SupabaseAdminClient,
  ) {}

  async findById(mentorshipId: string): Promise<Mentorship | undefined> {
    const { data, error } = await this.supabase
      .from('mentorship')
      .select()
      .eq('mentorship_id', mentorshipId)
      .maybeSingle();
    if (error) {
      throw error;
    }
    return data ? mentorshipRowSchema.parse(data) : undefined;
  }

  async findByParticipant(userId: string): Promise<Mentorship[]> {
    const { data, error } = await this.supabase
      .from('mentorship')
      .select()
      .or(`mentor_id.eq.${userId},mentee_id.eq.${userId}`)
      .order('created_at', { ascending: false });
    if (error || !data) {
      throw error ?? new Error('Failed to fetch mentorships.');
    }
    return mentorshipRowSchema.array().parse(data);
  }

  async findOpenBetween(
    mentorId: string,
    menteeId: string,
  ): Promise<Mentorship | undefined> {
    const { data, error } = await this.supabase
      .from('mentorship')
      .select()
      .eq('mentor_id', mentorId)
      .eq('mentee_id', menteeId)
      .in('status', [...OPEN_MENTORSHIP_STATUSES])
      .limit(1)
      .maybeSingle();
    if (error) {
      throw error;
    }
    return data ? mentorshipRowSchema.parse(data) : undefined;
  }

  async create(input: {
    mentorId: string;
    menteeId: string;
    goal: string;
  }): Promise<Mentorship> {
    const now = new Date().toISOString();
    const { data, error } = await this.supabase
      .from('mentorship')
      .insert({
        mentorship_id: createUUID(),
        mentor_id: input.mentorId,
        mentee_id: input.menteeId,
        goal: input.goal,
        status: 'pending',
        created_at: now,
        updated_at: now,
      })
      .select()
      .single();
    if (isUniqueViolation(error)) {
      throw new DuplicateMentorshipException();
    }
    if (error || !data) {
      throw error ?? new Error('Failed to create mentorship.');
    }
    return mentorshipRowSchema.parse(data);
  }

  async transition(
    mentorshipId: string,
    from: MentorshipStatus,
    to: MentorshipStatus,
  ): Promise<Mentorship | undefined> {
    // WHERE status = from の条件付き更新。0件なら他リクエストが先に遷移させている
    const { data, error } = await this.supabase
      .from('mentorship')
      .update({ status: to, updated_at: new Date().toISOString() })
      .eq('mentorship_id', mentorshipId)
      .eq('status', from)
      .select()
      .maybeSingle();
    if (error) {
      throw error;
    }
    return data ? mentorshipRowSchema.parse(data) : undefined;
  }

  async countByStatus(status: MentorshipStatus): Promise<number> {
    const { count, error } = await this.supabase
      .from('mentorship')
      .select('*', { count: 'exact', head: true })
      .eq('status', status);
    if (error) {
      throw error;
    }
    return count ?? 0;
  }
}
