import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { BillingModule } from '../billing/billing.module';
import { KieModule } from '../kie/kie.module';
import { GenerationService } from './generation.service/generation.service';

@Module({
  imports: [JobsModule, BillingModule, KieModule],
  providers: [GenerationService],
  exports: [GenerationService],
})
export class GenerationModule {}
