import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createAdminSupabaseClient, SUPABASE_ADMIN_CLIENT } from './adminClient';
import type { Env } from '../config/env';

@Global()
@Module({
  providers: [
    {
      provide: SUPABASE_ADMIN_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService<Env, true>) =>
        createAdminSupabaseClient(
          config.get('SUPABASE_URL', { infer: true }),
          config.get('SUPABASE_SERVICE_ROLE_KEY', { infer: true }),
        ),
    },
  ],
  exports: [SUPABASE_ADMIN_CLIENT],
})
export class SupabaseModule {}
