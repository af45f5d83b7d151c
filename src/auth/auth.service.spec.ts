import { Test, TestingModule } from '@nestjs/testing';
import { AuthService } from './auth.service';
import { PasswordService } from './password.service';
import { InvalidCredentialsException } from './auth.exceptions';
import { SessionService } from '../session/session.service';
import { USER_PORT } from '../user/user.port';
import { User } from '../user/user.types';
import {
  DuplicateEmailException,
  InvalidRoleException,
} from '../user/user.exceptions';

describe('AuthService', () => {
  let service: AuthService;
  let mockUserRepository: {
    findById: jest.Mock;
    findByIds: jest.Mock;
    findByEmail: jest.Mock;
    findByRole: jest.Mock;
    insert: jest.Mock;
    saveProfile: jest.Mock;
  };
  let mockSessionService: {
    openSession: jest.Mock;
    revoke: jest.Mock;
  };
  let mockPasswordService: {
    hash: jest.Mock;
    verify: jest.Mock;
  };

  const expiresAt = new Date('2026-02-01T00:00:00Z');

  const existingUser = User.create({
    user_id: 'user-001',
    role: 'mentee',
    name: 'Existing',
    email: 'taken@example.com',
    password_hash: 'stored-hash',
    created_at: new Date('2026-01-01T00:00:00Z'),
  });

  beforeEach(async () => {
    mockUserRepository = {
      findById: jest.fn(),
      findByIds: jest.fn(),
      findByEmail: jest.fn(),
      findByRole: jest.fn(),
      insert: jest.fn(async (user: User) => user),
      saveProfile: jest.fn(),
    };
    mockSessionService = {
      openSession: jest.fn().mockResolvedValue({ token: 'token-001', expiresAt }),
      revoke: jest.fn(),
    };
    mockPasswordService = {
      hash: jest.fn().mockResolvedValue('hashed-password'),
      verify: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: USER_PORT, useValue: mockUserRepository },
        { provide: SessionService, useValue: mockSessionService },
        { provide: PasswordService, useValue: mockPasswordService },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
  });

  describe('register', () => {
    const input = {
      name: 'New Mentor',
      email: 'New@Example.com',
      role: 'mentor',
      password: 'password-123',
    };

    it('パスワードをハッシュ化してユーザーを作成し、セッションを開始すること', async () => {
      mockUserRepository.findByEmail.mockResolvedValue(undefined);

      const result = await service.register(input);

      expect(mockPasswordService.hash).toHaveBeenCalledWith('password-123');
      const created: User = mockUserRepository.insert.mock.calls[0][0];
      expect(created.email).toBe('new@example.com');
      expect(created.role).toBe('mentor');
      expect(created.password_hash).toBe('hashed-password');
      expect(mockSessionService.openSession).toHaveBeenCalledWith(created);
      expect(result.token).toBe('token-001');
      expect(result.expiresAt).toBe(expiresAt);
      expect(result.user).not.toHaveProperty('password_hash');
    });

    it('登録済みのメールアドレスの場合 DuplicateEmailException を投げること', async () => {
      mockUserRepository.findByEmail.mockResolvedValue(existingUser);

      await expect(
        service.register({ ...input, email: 'taken@example.com' }),
      ).rejects.toBeInstanceOf(DuplicateEmailException);
      expect(mockUserRepository.insert).not.toHaveBeenCalled();
    });

    it('同時登録で一意制約に当たった場合も DuplicateEmailException になること', async () => {
      mockUserRepository.findByEmail.mockResolvedValue(undefined);
      mockUserRepository.insert.mockRejectedValue(new DuplicateEmailException());

      await expect(service.register(input)).rejects.toBeInstanceOf(
        DuplicateEmailException,
      );
      expect(mockSessionService.openSession).not.toHaveBeenCalled();
    });

    it('無効なロールの場合 InvalidRoleException を投げること', async () => {
      await expect(
        service.register({ ...input, role: 'admin' }),
      ).rejects.toBeInstanceOf(InvalidRoleException);
      expect(mockUserRepository.findByEmail).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    it('パスワードが一致する場合セッションを開始すること', async () => {
      mockUserRepository.findByEmail.mockResolvedValue(existingUser);
      mockPasswordService.verify.mockResolvedValue(true);

      const result = await service.login({
        email: 'taken@example.com',
        password: 'password-123',
      });

      expect(mockPasswordService.verify).toHaveBeenCalledWith(
        'password-123',
        'stored-hash',
      );
      expect(result.user.user_id).toBe('user-001');
    });

    it('パスワードが一致しない場合 InvalidCredentialsException を投げること', async () => {
      mockUserRepository.findByEmail.mockResolvedValue(existingUser);
      mockPasswordService.verify.mockResolvedValue(false);

      await expect(
        service.login({ email: 'taken@example.com', password: 'wrong' }),
      ).rejects.toBeInstanceOf(InvalidCredentialsException);
      expect(mockSessionService.openSession).not.toHaveBeenCalled();
    });

    it('未登録のメールアドレスでも同じエラーになること', async () => {
      mockUserRepository.findByEmail.mockResolvedValue(undefined);

      await expect(
        service.login({ email: 'nobody@example.com', password: 'whatever' }),
      ).rejects.toThrow('Invalid email or password.');
      expect(mockPasswordService.verify).not.toHaveBeenCalled();
    });
  });

  describe('logout', () => {
    it('セッションの sid を失効させること', async () => {
      await service.logout({
        sub: 'user-001',
        sid: 'session-001',
        role: 'mentee',
        iat: 1,
        exp: 2,
      });

      expect(mockSessionService.revoke).toHaveBeenCalledWith('session-001');
    });
  });
});
