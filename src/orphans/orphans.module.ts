import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { OrphanCallback } from './entities/orphan-callback.entity';
import { OrphansService } from './orphans.service/orphans.service';

@Module({
  imports: [TypeOrmModule.forFeature([OrphanCallback])],
  providers: [OrphansService],
  exports: [OrphansService],
})
export class OrphansModule {}
