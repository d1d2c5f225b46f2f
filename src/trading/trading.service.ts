import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { describeError } from '../common/errors/engine.errors';
import { ExchangeService } from '../exchange/exchange.service';
import { MarketDataService } from '../exchange/market-data.service';
import { TrendRsiStrategy } from '../strategy/trend-rsi.strategy';
import { TradingEngineService } from './trading-engine.service';
import { TradeDecision } from './dto/trade-decision.dto';
import { BALANCE_SOURCE, BalanceSource } from './interfaces/trading.interface';

@Injectable()
export class TradingService implements OnModuleDestroy {
  private readonly logger = new Logger(TradingService.name);
  private isTrading: boolean = true;
  private cycleInProgress = false;

  constructor(
    private exchangeService: ExchangeService,
    private marketDataService: MarketDataService,
    private trendRsiStrategy: TrendRsiStrategy,
    private tradingEngine: TradingEngineService,
    @Inject(BALANCE_SOURCE) private balanceSource: BalanceSource,
  ) {
    this.logger.log(`Торговый сервис инициализирован для ${this.tradingEngine.getSymbols().join(', ')}`);
  }

  @Cron(CronExpression.EVERY_MINUTE)
  async executeTradingLogic() {
    if (!this.isTrading) {
      this.logger.debug('Торговля приостановлена');
      return;
    }
    if (this.cycleInProgress) {
      this.logger.warn('Предыдущий цикл еще выполняется, пропускаем');
      return;
    }

    this.cycleInProgress = true;
    try {
      await this.runCycle();
    } catch (error) {
      this.logger.error(`Ошибка в торговой логике: ${describeError(error)}`);
    } finally {
      this.cycleInProgress = false;
    }
  }

  /**
   * Один цикл: баланс, затем инструменты по очереди. Ошибка по паре не прерывает остальные
   */
  async runCycle(): Promise<TradeDecision[]> {
    const totalBalance = await this.balanceSource.getTotalBalance();
    this.tradingEngine.beginCycle(totalBalance);

    const decisions: TradeDecision[] = [];
    for (const symbol of this.tradingEngine.getSymbols()) {
      if (!this.isTrading) {
        this.logger.log('Цикл прерван: торговля остановлена');
        break;
      }

      try {
        const candles = await this.exchangeService.getCandles(
          symbol,
          this.trendRsiStrategy.timeframe,
          this.trendRsiStrategy.candleLimit,
        );
        const snapshot = this.marketDataService.buildSnapshot(symbol, candles);
        if (!snapshot) {
          this.logger.warn(`${symbol}: нет свечей, пропускаем`);
          continue;
        }

        const signal = this.trendRsiStrategy.analyze(symbol, candles.map((candle) => candle.close));
        const decision = await this.tradingEngine.evaluateCycle(symbol, snapshot, signal);
        decisions.push(decision);

        this.logger.log(
          `${symbol}: сигнал ${signal.action} (${signal.strength}) -> ${decision.action} | ${decision.reason}`,
        );
      } catch (error) {
        this.logger.error(`${symbol}: ошибка цикла: ${describeError(error)}`);
      }
    }

    return decisions;
  }

  isRunning(): boolean {
    return this.isTrading;
  }

  stopTrading() {
    this.isTrading = false;
    this.logger.log('❌ Торговля остановлена');
  }

  startTrading() {
    this.isTrading = true;
    this.logger.log('✅ Торговля запущена');
  }

  onModuleDestroy() {
    this.isTrading = false;
  }
}
