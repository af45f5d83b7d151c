import { z } from 'zod';

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().min(1, 'email is required'),
  password: z.string().min(1, 'password is required'),
});

export type LoginDto = z.infer<typeof loginSchema>;
