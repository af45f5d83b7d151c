import { Body, Controller, Get, Put, Query, UseGuards } from '@nestjs/common';
import { UserService } from './user.service';
import { SessionAuthGuard } from '../session/session-auth.guard';
import { CurrentSession } from '../common/decorators/current-session.decorator';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import {
  updateProfileSchema,
  type UpdateProfileDto,
} from './dto/updateProfile.dto';
import {
  listUsersQuerySchema,
  type ListUsersQueryDto,
} from './dto/listUsersQuery.dto';
import type { PublicUser } from './user.types';
import type { SessionPayload } from '../session/session.types';

interface UserResponse {
  data: PublicUser;
}

interface UserListResponse {
  data: PublicUser[];
}

@Controller('users')
@UseGuards(SessionAuthGuard)
export class UserController {
  constructor(private readonly userService: UserService) {}

  @Get()
  async listUsers(
    @Query(new ZodValidationPipe(listUsersQuerySchema)) query: ListUsersQueryDto,
  ): Promise<UserListResponse> {
    const users = await this.userService.listByRole(query.role);
    return { data: users };
  }

  @Get('me')
  async getMe(@CurrentSession() session: SessionPayload): Promise<UserResponse> {
    const user = await this.userService.getProfile(session.sub);
    return { data: user };
  }

  @Put('me/profile')
  async updateProfile(
    @CurrentSession() session: SessionPayload,
    @Body(new ZodValidationPipe(updateProfileSchema)) body: UpdateProfileDto,
  ): Promise<UserResponse> {
    const user = await this.userService.updateProfile(session.sub, body);
    return { data: user };
  }
}
