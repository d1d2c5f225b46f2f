import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EngineConfigModule } from './config/engine-config.module';
import { ExchangeModule } from './exchange/exchange.module';
import { StrategyModule } from './strategy/strategy.module';
import { TradingModule } from './trading/trading.module';
import { RiskManagementModule } from './risk-management/risk-management.module';
import { AllocationModule } from './allocation/allocation.module';
import { PositionModule } from './position/position.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ScheduleModule.forRoot(),
    EngineConfigModule,
    ExchangeModule,
    StrategyModule,
    RiskManagementModule,
    AllocationModule,
    PositionModule,
    TradingModule,
  ],
})
export class AppModule {}
