import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthService } from './auth.service';
import { SessionAuthGuard } from '../session/session-auth.guard';
import { CurrentSession } from '../common/decorators/current-session.decorator';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { registerSchema, type RegisterDto } from './dto/register.dto';
import { loginSchema, type LoginDto } from './dto/login.dto';
import type { AuthResult } from './auth.types';
import type { PublicUser } from '../user/user.types';
import type { SessionPayload } from '../session/session.types';

interface AuthResponse {
  data: AuthResult;
}

interface MeResponse {
  data: PublicUser;
}

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  async register(
    @Body(new ZodValidationPipe(registerSchema)) body: RegisterDto,
  ): Promise<AuthResponse> {
    const result = await this.authService.register(body);
    return { data: result };
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Body(new ZodValidationPipe(loginSchema)) body: LoginDto,
  ): Promise<AuthResponse> {
    const result = await this.authService.login(body);
    return { data: result };
  }

  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  @UseGuards(SessionAuthGuard)
  async logout(@CurrentSession() session: SessionPayload): Promise<void> {
    await this.authService.logout(session);
  }

  @Get('me')
  @UseGuards(SessionAuthGuard)
  async me(@CurrentSession() session: SessionPayload): Promise<MeResponse> {
    const user = await this.authService.me(session);
    return { data: user };
  }
}
