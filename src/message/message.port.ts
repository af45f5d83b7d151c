import type { Message } from './message.types';

export interface MessagePort {
  /** created_at 昇順（同時刻は msg_id 昇順）で返す */
  findAllByMentorship(mentorshipId: string): Promise<Message[]>;
  createMessage(input: {
    mentorshipId: string;
    senderId: string;
    body: string;
  }): Promise<Message>;
}

export const MESSAGE_PORT = 'MESSAGE_PORT';
