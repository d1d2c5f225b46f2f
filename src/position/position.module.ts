import { Module } from '@nestjs/common';
import { PositionLifecycleService } from './position-lifecycle.service';

@Module({
  providers: [PositionLifecycleService],
  exports: [PositionLifecycleService],
})
export class PositionModule {}
