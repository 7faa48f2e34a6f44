import { Module } from '@nestjs/common';
import { KieService } from './kie.service/kie.service';

@Module({
  providers: [KieService],
  exports: [KieService],
})
export class KieModule {}
