import { registerSchema } from './register.dto';

describe('registerSchema', () => {
  const base = {
    name: 'Mentee A',
    email: 'mentee@example.com',
    role: 'mentee',
  };

  it('72 バイトちょうどのパスワードは受け付けること', () => {
    const password = 'あ'.repeat(24);

    const result = registerSchema.safeParse({ ...base, password });

    expect(result.success).toBe(true);
  });

  it('文字数が少なくても 72 バイトを超えるパスワードは拒否すること', () => {
    const password = 'あ'.repeat(24) + 'a';

    const result = registerSchema.safeParse({ ...base, password });

    expect(result.success).toBe(false);
    expect(result.error?.issues).toEqual([
      expect.objectContaining({
        path: ['password'],
        message: 'password must be at most 72 bytes',
      }),
    ]);
  });

  it('先頭 72 バイトが同じ別パスワードを登録できないこと', () => {
    const password = 'あ'.repeat(24) + 'original-tail';

    expect(registerSchema.safeParse({ ...base, password }).success).toBe(false);
  });
});
