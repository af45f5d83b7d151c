import {
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { USER_PORT } from '../user/user.port';
import type { UserPort } from '../user/user.port';
import { User, isUserRole } from '../user/user.types';
import type { PublicUser } from '../user/user.types';
import {
  DuplicateEmailException,
  InvalidRoleException,
} from '../user/user.exceptions';
import { SessionService } from '../session/session.service';
import type { SessionPayload } from '../session/session.types';
import { PasswordService } from './password.service';
import { InvalidCredentialsException } from './auth.exceptions';
import type { AuthResult } from './auth.types';
import type { RegisterDto } from './dto/register.dto';
import type { LoginDto } from './dto/login.dto';
import { createUUID } from '../common/uuid';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(USER_PORT)
    private readonly userRepository: UserPort,
    private readonly sessionService: SessionService,
    private readonly passwordService: PasswordService,
  ) {}

  async register(input: RegisterDto): Promise<AuthResult> {
    if (!isUserRole(input.role)) {
      throw new InvalidRoleException();
    }
    const email = User.normalizeEmail(input.email);
    if (await this.userRepository.findByEmail(email)) {
      throw new DuplicateEmailException();
    }

    const passwordHash = await this.passwordService.hash(input.password);
    const user = await this.userRepository.insert(
      User.create({
        user_id: createUUID(),
        role: input.role,
        name: input.name,
        email,
        password_hash: passwordHash,
        created_at: new Date(),
      }),
    );
    this.logger.log(`User registered: user=${user.user_id} role=${user.role}`);

    return this.startSession(user);
  }

  async login(input: LoginDto): Promise<AuthResult> {
    const email = User.normalizeEmail(input.email);
    const user = await this.userRepository.findByEmail(email);
    if (
      !user ||
      !(await this.passwordService.verify(input.password, user.password_hash))
    ) {
      this.logger.warn(`Failed login attempt: email=${email}`);
      throw new InvalidCredentialsException();
    }
    this.logger.log(`User signed in: user=${user.user_id}`);
    return this.startSession(user);
  }

  async logout(session: SessionPayload): Promise<void> {
    await this.sessionService.revoke(session.sid);
    this.logger.log(`User signed out: user=${session.sub}`);
  }

  async me(session: SessionPayload): Promise<PublicUser> {
    const user = await this.userRepository.findById(session.sub);
    if (!user) {
      throw new UnauthorizedException('Account no longer exists');
    }
    return user.toPublic();
  }

  private async startSession(user: User): Promise<AuthResult> {
    const { token, expiresAt } = await this.sessionService.openSession(user);
    return { token, expiresAt, user: user.toPublic() };
  }
}
