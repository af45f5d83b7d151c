import { z } from 'zod';
import { USER_ROLES } from '../user.types';

export const listUsersQuerySchema = z.object({
  role: z.enum(USER_ROLES),
});

export type ListUsersQueryDto = z.infer<typeof listUsersQuerySchema>;
