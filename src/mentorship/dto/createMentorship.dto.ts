import { z } from 'zod';
import { UUIDSchema, type UUID } from '../../common/uuid';

export const createMentorshipSchema: z.ZodObject<{
  mentorId: z.ZodEffects<z.ZodString, UUID, string>;
  goal: z.ZodString;
}> = z.object({
  mentorId: UUIDSchema,
  goal: z
    .string()
    .trim()
    .min(1, 'Please describe your goal.')
    .max(1000),
});

export type CreateMentorshipDto = z.infer<typeof createMentorshipSchema>;
