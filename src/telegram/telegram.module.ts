import { Module } from '@nestjs/common';
import { TelegrafModule } from 'nestjs-telegraf';
import { ConfigService } from '@nestjs/config';
import { TelegramService } from './telegram.service/telegram.service';
import { GenerationModule } from '../generation/generation.module';
import { JobsModule } from '../jobs/jobs.module';
import { BillingModule } from '../billing/billing.module';

// telegram.module.ts
@Module({
  imports: [
    TelegrafModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        token: cfg.getOrThrow<string>('TELEGRAM_BOT_TOKEN'),
        options: { telegram: { apiRoot: 'https://api.telegram.org' }, handlerTimeout: 120_000 },
      }),
    }),
    GenerationModule,
    JobsModule,
    BillingModule,
  ],
  providers: [TelegramService],
})
export class TelegramModule {}
