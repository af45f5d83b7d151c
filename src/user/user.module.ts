import { Module } from '@nestjs/common';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { UserRepository } from './repositories/user.repository';
import { USER_PORT } from './user.port';
import { SessionModule } from '../session/session.module';

@Module({
  imports: [SessionModule],
  providers: [
    UserService,
    {
      provide: USER_PORT,
      useClass: UserRepository,
    },
  ],
  controllers: [UserController],
  exports: [UserService, USER_PORT],
})
export class UserModule {}
