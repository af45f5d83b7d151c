import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { validateEnv } from './config/env';
import { SupabaseModule } from './supabase/supabase.module';
import { SessionModule } from './session/session.module';
import { AuthModule } from './auth/auth.module';
import { UserModule } from './user/user.module';
import { MentorshipModule } from './mentorship/mentorship.module';
import { MessageModule } from './message/message.module';
import { DashboardModule } from './dashboard/dashboard.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    SupabaseModule,
    SessionModule,
    AuthModule,
    UserModule,
    MentorshipModule,
    MessageModule,
    DashboardModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
