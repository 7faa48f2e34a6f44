import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { GenerationJob } from './entities/generation-job.entity';
import { JobsService } from './jobs.service/jobs.service';

@Module({
  imports: [TypeOrmModule.forFeature([GenerationJob])],
  providers: [JobsService],
  exports: [JobsService],
})
export class JobsModule {}
