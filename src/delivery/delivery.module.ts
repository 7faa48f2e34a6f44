import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { DeliveryService } from './delivery.service/delivery.service';

// Бот (getBotToken) приходит из глобального модуля TelegrafModule
@Module({
  imports: [JobsModule],
  providers: [DeliveryService],
  exports: [DeliveryService],
})
export class DeliveryModule {}
