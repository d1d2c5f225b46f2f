import { Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../config/engine-config.service';
import { ExecutionError } from '../common/errors/engine.errors';
import { legPnl } from '../position/position-lifecycle.service';
import { PositionLeg } from '../position/interfaces/position.interface';
import { BalanceSource, ExecutionPort, OrderSide } from '../trading/interfaces/trading.interface';
import { MarketDataService } from './market-data.service';

/**
 * Бумажная торговля: ордера исполняются по последней цене, реализованный P&L меняет баланс
 */
@Injectable()
export class PaperExecutionService implements ExecutionPort, BalanceSource {
  private readonly logger = new Logger(PaperExecutionService.name);
  private readonly legs = new Map<string, PositionLeg[]>();
  private realizedPnl = 0;
  private orderCounter = 0;

  constructor(
    private engineConfig: EngineConfigService,
    private marketDataService: MarketDataService,
  ) {}

  async placeOrder(symbol: string, side: OrderSide, size: number, leverage: number): Promise<string> {
    const price = this.requirePrice(symbol);
    const legs = this.legs.get(symbol) ?? [];
    legs.push({ side, entryPrice: price, size, leverage });
    this.legs.set(symbol, legs);

    this.orderCounter += 1;
    const orderId = `paper-${this.orderCounter}`;
    this.logger.log(`📝 [PAPER] ${symbol} ${side} ${size} @ ${price} (${leverage}x), id=${orderId}`);
    return orderId;
  }

  async closePosition(symbol: string): Promise<void> {
    const legs = this.legs.get(symbol);
    if (!legs || legs.length === 0) {
      return;
    }

    const price = this.requirePrice(symbol);
    const pnl = legs.reduce((sum, leg) => sum + legPnl(leg, price), 0);
    this.realizedPnl += pnl;
    this.legs.delete(symbol);

    this.logger.log(`📝 [PAPER] ${symbol} закрыт @ ${price}, P&L: ${pnl.toFixed(2)}`);
  }

  async getTotalBalance(): Promise<number> {
    return this.engineConfig.settings.initialBalance + this.realizedPnl;
  }

  getOpenLegs(symbol: string): PositionLeg[] {
    return (this.legs.get(symbol) ?? []).map((leg) => ({ ...leg }));
  }

  private requirePrice(symbol: string): number {
    const price = this.marketDataService.getLastPrice(symbol);
    if (price === undefined) {
      throw new ExecutionError(`Нет цены для ${symbol}, ордер не исполнен`, { symbol });
    }
    return price;
  }
}
