import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { OrphansModule } from '../orphans/orphans.module';
import { CallbackModule } from '../callback/callback.module';
import { DeliveryModule } from '../delivery/delivery.module';
import { BillingModule } from '../billing/billing.module';
import { LeadershipModule } from '../leadership/leadership.module';
import { ReconciliationService } from './reconciliation.service/reconciliation.service';

@Module({
  imports: [JobsModule, OrphansModule, CallbackModule, DeliveryModule, BillingModule, LeadershipModule],
  providers: [ReconciliationService],
  exports: [ReconciliationService],
})
export class ReconciliationModule {}
