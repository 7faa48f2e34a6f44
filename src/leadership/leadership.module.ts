import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ServiceLease } from './entities/service-lease.entity';
import { LeaseService } from './lease.service/lease.service';

@Module({
  imports: [TypeOrmModule.forFeature([ServiceLease])],
  providers: [LeaseService],
  exports: [LeaseService],
})
export class LeadershipModule {}
