import { Module } from '@nestjs/common';
import { TrendRsiStrategy } from './trend-rsi.strategy';

@Module({
  providers: [TrendRsiStrategy],
  exports: [TrendRsiStrategy],
})
export class StrategyModule {}
