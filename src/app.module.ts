import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TelegramModule } from './telegram/telegram.module';
import { JobsModule } from './jobs/jobs.module';
import { OrphansModule } from './orphans/orphans.module';
import { BillingModule } from './billing/billing.module';
import { KieModule } from './kie/kie.module';
import { GenerationModule } from './generation/generation.module';
import { DeliveryModule } from './delivery/delivery.module';
import { CallbackModule } from './callback/callback.module';
import { LeadershipModule } from './leadership/leadership.module';
import { ReconciliationModule } from './reconciliation/reconciliation.module';
import { readNumber } from './common/config';
import { migrations } from './migrations';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      expandVariables: true,
    }),
    // Схема базы меняется только миграциями, каждая применяется один раз
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        type: 'postgres',
        host: cfg.get<string>('DATABASE_HOST'),
        port: readNumber(cfg, 'DATABASE_PORT', 5432),
        username: cfg.get<string>('DB_USER'),
        password: cfg.get<string>('DB_PASS'),
        database: cfg.get<string>('DB_NAME'),
        autoLoadEntities: true,
        synchronize: false,
        migrations,
        migrationsRun: true,
      }),
    }),
    TelegramModule,
    JobsModule,
    OrphansModule,
    BillingModule,
    KieModule,
    GenerationModule,
    DeliveryModule,
    CallbackModule,
    LeadershipModule,
    ReconciliationModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
