import { Module } from '@nestjs/common';
import { MessageController } from './message.controller';
import { MessageService } from './message.service';
import { MessageRepository } from './repositories/message.repository';
import { MentorshipModule } from '../mentorship/mentorship.module';
import { UserModule } from '../user/user.module';
import { SessionModule } from '../session/session.module';
import { MESSAGE_PORT } from './message.port';

@Module({
  imports: [MentorshipModule, UserModule, SessionModule],
  controllers: [MessageController],
  providers: [
    MessageService,
    {
      provide: MESSAGE_PORT,
      useClass: MessageRepository,
    },
  ],
  exports: [MessageService],
})
export class MessageModule {}
