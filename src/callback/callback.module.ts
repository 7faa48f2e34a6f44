import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { OrphansModule } from '../orphans/orphans.module';
import { DeliveryModule } from '../delivery/delivery.module';
import { BillingModule } from '../billing/billing.module';
import { LeadershipModule } from '../leadership/leadership.module';
import { CallbackService } from './callback.service/callback.service';
import { KieCallbackController } from './kie-callback.controller';

@Module({
  imports: [JobsModule, OrphansModule, DeliveryModule, BillingModule, LeadershipModule],
  controllers: [KieCallbackController],
  providers: [CallbackService],
  exports: [CallbackService],
})
export class CallbackModule {}
