import { Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../config/engine-config.service';
import { MarketSnapshot, OrderSide, Signal } from '../trading/interfaces/trading.interface';
import {
  ClosedPosition,
  ExitReason,
  LifecycleIntent,
  LifecycleState,
  Position,
  PositionLeg,
} from './interfaces/position.interface';

function opposite(side: OrderSide): OrderSide {
  return side === 'long' ? 'short' : 'long';
}

export function legPnl(leg: PositionLeg, price: number): number {
  const diff = leg.side === 'long' ? price - leg.entryPrice : leg.entryPrice - price;
  return diff * leg.size;
}

/**
 * Жизненный цикл позиции по каждой паре: вход, защитные выходы, хедж, закрытие.
 * evaluate только предлагает действие; состояние меняется через apply* после исполнения.
 */
@Injectable()
export class PositionLifecycleService {
  private readonly logger = new Logger(PositionLifecycleService.name);
  private readonly positions = new Map<string, Position>();

  constructor(private engineConfig: EngineConfigService) {}

  getState(symbol: string): LifecycleState {
    const position = this.positions.get(symbol);
    if (!position) return LifecycleState.FLAT;
    if (position.side === 'long') {
      return position.hedge ? LifecycleState.HEDGED_LONG : LifecycleState.OPEN_LONG;
    }
    return position.hedge ? LifecycleState.HEDGED_SHORT : LifecycleState.OPEN_SHORT;
  }

  getPosition(symbol: string): Position | undefined {
    const position = this.positions.get(symbol);
    if (!position) return undefined;
    return { ...position, hedge: position.hedge ? { ...position.hedge } : undefined };
  }

  hasPosition(symbol: string): boolean {
    return this.positions.has(symbol);
  }

  openSymbols(): string[] {
    return Array.from(this.positions.keys());
  }

  /**
   * Маржа всех открытых ног по ценам входа
   */
  getMarginInUse(): number {
    let margin = 0;
    this.positions.forEach((position) => {
      margin += (position.entryPrice * position.size) / position.leverage;
      if (position.hedge) {
        margin += (position.hedge.entryPrice * position.hedge.size) / position.hedge.leverage;
      }
    });
    return margin;
  }

  /**
   * Общий P&L позиции с хеджем по текущей цене
   */
  calculatePnl(position: Position, price: number): number {
    return legPnl(position, price) + (position.hedge ? legPnl(position.hedge, price) : 0);
  }

  evaluate(symbol: string, snapshot: MarketSnapshot, signal: Signal): LifecycleIntent {
    const position = this.positions.get(symbol);
    const { signalStrengthThreshold } = this.engineConfig.settings;

    if (!position) {
      if (signal.action === 'hold') {
        return { kind: 'hold', reason: 'Нет сигнала на вход' };
      }
      if (signal.strength < signalStrengthThreshold) {
        return { kind: 'hold', reason: `Сила сигнала ${signal.strength} ниже порога ${signalStrengthThreshold}` };
      }
      return {
        kind: 'open',
        side: signal.action === 'buy' ? 'long' : 'short',
        reason: signal.reason ?? `Сигнал ${signal.action} (${signal.strength})`,
      };
    }

    const price = snapshot.price;
    position.trailingExtreme =
      position.side === 'long'
        ? Math.max(position.trailingExtreme, price)
        : Math.min(position.trailingExtreme, price);
    position.unrealizedPnl = this.calculatePnl(position, price);

    const exit = this.checkExit(position, price);
    if (exit) {
      return { kind: 'close', exitReason: exit.exitReason, pnl: position.unrealizedPnl, reason: exit.reason };
    }

    if (!position.hedge) {
      const lossPercent =
        ((position.side === 'long' ? position.entryPrice - price : price - position.entryPrice) /
          position.entryPrice) *
        100;
      const hedgeSize = Math.floor(position.size / 2);

      if (lossPercent > this.engineConfig.settings.hedgeTriggerPercent && hedgeSize >= 1) {
        return {
          kind: 'hedge',
          side: opposite(position.side),
          size: hedgeSize,
          reason: `Убыток ${lossPercent.toFixed(2)}% от входа, хеджируем ${hedgeSize} контрактов`,
        };
      }
    }

    return { kind: 'hold', reason: 'Удерживаем позицию' };
  }

  applyOpen(symbol: string, side: OrderSide, entryPrice: number, size: number, leverage: number): Position {
    const { stopLossPercent, takeProfitPercent } = this.engineConfig.settings;
    const direction = side === 'long' ? 1 : -1;

    const position: Position = {
      side,
      entryPrice,
      size,
      leverage,
      stopLoss: entryPrice * (1 - (direction * stopLossPercent) / 100),
      takeProfit: entryPrice * (1 + (direction * takeProfitPercent) / 100),
      trailingExtreme: entryPrice,
      unrealizedPnl: 0,
      openedAt: new Date(),
    };
    this.positions.set(symbol, position);

    this.logger.log(
      `🎯 ${symbol}: открыт ${side} ${size} @ ${entryPrice} (${leverage}x) | ` +
      `SL: ${position.stopLoss.toFixed(4)} | TP: ${position.takeProfit.toFixed(4)}`,
    );
    return { ...position };
  }

  applyHedge(symbol: string, price: number, size: number, leverage: number): boolean {
    const position = this.positions.get(symbol);
    if (!position || position.hedge) {
      return false;
    }

    position.hedge = { side: opposite(position.side), entryPrice: price, size, leverage };
    this.logger.log(`🛡️ ${symbol}: хедж ${position.hedge.side} ${size} @ ${price} (${leverage}x)`);
    return true;
  }

  /**
   * Закрывает обе ноги; P&L основной позиции и хеджа фиксируется одной суммой
   */
  applyClose(symbol: string, price: number): ClosedPosition | undefined {
    const position = this.positions.get(symbol);
    if (!position) {
      return undefined;
    }

    const pnl = this.calculatePnl(position, price);
    this.positions.delete(symbol);

    this.logger.log(`❌ ${symbol}: позиция закрыта @ ${price} | P&L: ${pnl.toFixed(2)}`);
    return { position, exitPrice: price, pnl };
  }

  private checkExit(position: Position, price: number): { exitReason: ExitReason; reason: string } | undefined {
    const isLong = position.side === 'long';

    if (isLong ? price <= position.stopLoss : price >= position.stopLoss) {
      return { exitReason: 'stop-loss', reason: `Стоп-лосс ${position.stopLoss.toFixed(4)}` };
    }
    if (isLong ? price >= position.takeProfit : price <= position.takeProfit) {
      return { exitReason: 'take-profit', reason: `Тейк-профит ${position.takeProfit.toFixed(4)}` };
    }

    const retrace = (isLong ? position.trailingExtreme - price : price - position.trailingExtreme) / position.trailingExtreme;
    if (retrace * 100 >= this.engineConfig.settings.trailingStopPercent) {
      return {
        exitReason: 'trailing-stop',
        reason: `Трейлинг-стоп: откат ${(retrace * 100).toFixed(2)}% от ${position.trailingExtreme}`,
      };
    }

    return undefined;
  }
}
