import { Module } from '@nestjs/common';
import { EngineConfigService } from '../config/engine-config.service';
import { BALANCE_SOURCE, EXECUTION_PORT } from '../trading/interfaces/trading.interface';
import { ExchangeService } from './exchange.service';
import { MarketDataService } from './market-data.service';
import { PaperExecutionService } from './paper-execution.service';

const selectByMode = (engineConfig: EngineConfigService, exchange: ExchangeService, paper: PaperExecutionService) =>
  engineConfig.settings.paperTrading ? paper : exchange;

@Module({
  providers: [
    ExchangeService,
    MarketDataService,
    PaperExecutionService,
    {
      provide: EXECUTION_PORT,
      useFactory: selectByMode,
      inject: [EngineConfigService, ExchangeService, PaperExecutionService],
    },
    {
      provide: BALANCE_SOURCE,
      useFactory: selectByMode,
      inject: [EngineConfigService, ExchangeService, PaperExecutionService],
    },
  ],
  exports: [ExchangeService, MarketDataService, EXECUTION_PORT, BALANCE_SOURCE],
})
export class ExchangeModule {}
