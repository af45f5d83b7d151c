import { z } from 'zod';

export const createMessageSchema = z.object({
  body: z.string().trim().min(1, 'Message cannot be empty.').max(4000),
});

export type CreateMessageDto = z.infer<typeof createMessageSchema>;
