import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { USER_PORT } from './user.port';
import type { UserPort } from './user.port';
import type { ProfilePatch, PublicUser, UserRole } from './user.types';

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @Inject(USER_PORT)
    private readonly userRepository: UserPort,
  ) {}

  async getProfile(userId: string): Promise<PublicUser> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new NotFoundException(`User ${userId} not found`);
    }
    return user.toPublic();
  }

  /**
   * プロフィールを更新する。userId は必ずセッションから渡すこと。
   * リクエストボディのIDで他ユーザーを更新する経路は存在しない。
   */
  async updateProfile(userId: string, patch: ProfilePatch): Promise<PublicUser> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      throw new NotFoundException(`User ${userId} not found`);
    }
    const updated = await this.userRepository.saveProfile(
      user.withProfile(patch),
    );
    if (!updated) {
      throw new NotFoundException(`User ${userId} not found`);
    }
    this.logger.log(`Profile updated: user=${userId}`);
    return updated.toPublic();
  }

  async listByRole(role: UserRole): Promise<PublicUser[]> {
    const users = await this.userRepository.findByRole(role);
    return users.map((user) => user.toPublic());
  }
}
