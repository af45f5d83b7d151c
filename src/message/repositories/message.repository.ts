import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import type { Message } from '../message.types';
import type { MessagePort } from '../message.port';
import { createUUID } from '../../common/uuid';
import { SUPABASE_ADMIN_CLIENT } from '../../supabase/adminClient';
import type { SupabaseAdminClient } from '../../supabase/adminClient';

const messageRowSchema = z.object({
  msg_id: z.string(),
  mentorship_id: z.string(),
  sender_id: z.string(),
  body: z.string(),
  created_at: z.coerce.date(),
});

@Injectable()
export class MessageRepository implements MessagePort {
  constructor(
    @Inject(SUPABASE_ADMIN_CLIENT)
    private readonly supabase: SupabaseAdminClient,
  ) {}

  async findAllByMentorship(mentorshipId: string): Promise<Message[]> {
    const { data, error } = await this.supabase
      .from('message')
      .select()
      .eq('mentorship_id', mentorshipId)
      .order('created_at', { ascending: true })
      .order('msg_id', { ascending: true });
    if (error || !data) {
      throw error ?? new Error('Failed to fetch messages.');
    }
    return messageRowSchema.array().parse(data);
  }

  async createMessage(input: {
    mentorshipId: string;
    senderId: string;
    body: string;
  }): Promise<Message> {
    const { data, error } = await this.supabase
      .from('message')
      .insert({
        msg_id: createUUID(),
        mentorship_id: input.mentorshipId,
        sender_id: input.senderId,
        body: input.body,
        created_at: new Date().toISOString(),
      })
      .select()
      .single();
    if (error || !data) {
      throw error ?? new Error('Failed to create message.');
    }
    return messageRowSchema.parse(data);
  }
}
