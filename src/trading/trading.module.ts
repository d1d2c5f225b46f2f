import { Module } from '@nestjs/common';
import { TradingService } from './trading.service';
import { TradingEngineService } from './trading-engine.service';
import { RiskManagementController } from './risk-management.controller';
import { ExchangeModule } from '../exchange/exchange.module';
import { StrategyModule } from '../strategy/strategy.module';
import { RiskManagementModule } from '../risk-management/risk-management.module';
import { AllocationModule } from '../allocation/allocation.module';
import { PositionModule } from '../position/position.module';

@Module({
  imports: [ExchangeModule, StrategyModule, RiskManagementModule, AllocationModule, PositionModule],
  providers: [TradingService, TradingEngineService],
  controllers: [RiskManagementController],
  exports: [TradingEngineService],
})
export class TradingModule {}
