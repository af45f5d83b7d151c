import { z } from 'zod';

// role は文字列として受け取り、値の妥当性は AuthService で InvalidRole として判定する
export const registerSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(80),
  email: z.string().trim().toLowerCase().email(),
  role: z.string().trim().min(1, 'role is required'),
  // bcrypt は先頭 72 バイトしか使わないため、文字数ではなくバイト数で制限する
  password: z
    .string()
    .min(8, 'password must be at least 8 characters')
    .refine(
      (password) => Buffer.byteLength(password, 'utf8') <= 72,
      'password must be at most 72 bytes',
    ),
});

export type RegisterDto = z.infer<typeof registerSchema>;
