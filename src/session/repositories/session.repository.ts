import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import type { Session } from '../session.types';
import type { SessionPort } from '../session.port';
import { SUPABASE_ADMIN_CLIENT } from '../../supabase/adminClient';
import type { SupabaseAdminClient } from '../../supabase/adminClient';

const sessionRowSchema = z.object({
  session_id: z.string(),
  user_id: z.string(),
  created_at: z.coerce.date(),
  expires_at: z.coerce.date(),
  revoked_at: z.coerce.date().nullable(),
});

@Injectable()
export class SessionRepository implements SessionPort {
  constructor(
    @Inject(SUPABASE_ADMIN_CLIENT)
    private readonly supabase: SupabaseAdminClient,
  ) {}

  async insert(session: Session): Promise<void> {
    const { error } = await this.supabase.from('session').insert({
      session_id: session.session_id,
      user_id: session.user_id,
      created_at: session.created_at.toISOString(),
      expires_at: session.expires_at.toISOString(),
      revoked_at: session.revoked_at ? session.revoked_at.toISOString() : null,
    });
    if (error) {
      throw error;
    }
  }

  async findById(sessionId: string): Promise<Session | undefined> {
    const { data, error } = await this.supabase
      .from('session')
      .select()
      .eq('session_id', sessionId)
      .maybeSingle();
    if (error) {
      throw error;
    }
    return data ? sessionRowSchema.parse(data) : undefined;
  }

  async revoke(sessionId: string, revokedAt: Date): Promise<void> {
    const { error } = await this.supabase
      .from('session')
      .update({ revoked_at: revokedAt.toISOString() })
      .eq('session_id', sessionId)
      .is('revoked_at', null);
    if (error) {
      throw error;
    }
  }
}
