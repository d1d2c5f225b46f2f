import { Injectable, Logger } from '@nestjs/common';
import { MarketSnapshot } from '../trading/interfaces/trading.interface';
import { Candle } from './interfaces/candle.interface';

const DEFAULT_VOLATILITY = 0.03;
const RECENT_VOLUME_CANDLES = 5;
const BASELINE_VOLUME_CANDLES = 20;

/**
 * Снимок рынка по свечам: цена, волатильность, тренд объема.
 * Последняя цена кешируется для бумажного исполнения.
 */
@Injectable()
export class MarketDataService {
  private readonly logger = new Logger(MarketDataService.name);
  private readonly lastPrices = new Map<string, number>();

  /**
   * Стандартное отклонение простых доходностей close-to-close
   */
  calculateVolatility(closes: number[]): number {
    if (closes.length < 2) {
      return DEFAULT_VOLATILITY;
    }

    const returns: number[] = [];
    for (let i = 1; i < closes.length; i++) {
      if (closes[i - 1] > 0) {
        returns.push((closes[i] - closes[i - 1]) / closes[i - 1]);
      }
    }
    if (returns.length === 0) {
      return DEFAULT_VOLATILITY;
    }

    const avgReturn = returns.reduce((sum, ret) => sum + ret, 0) / returns.length;
    const variance = returns.reduce((sum, ret) => sum + Math.pow(ret - avgReturn, 2), 0) / returns.length;
    return Math.sqrt(variance);
  }

  /**
   * Средний объем последних 5 свечей относительно 20 предыдущих, минус 1
   */
  calculateVolumeTrend(volumes: number[]): number {
    if (volumes.length <= RECENT_VOLUME_CANDLES) {
      return 0;
    }

    const recent = volumes.slice(-RECENT_VOLUME_CANDLES);
    const baseline = volumes.slice(
      Math.max(0, volumes.length - RECENT_VOLUME_CANDLES - BASELINE_VOLUME_CANDLES),
      volumes.length - RECENT_VOLUME_CANDLES,
    );
    const mean = (values: number[]) => values.reduce((sum, value) => sum + value, 0) / values.length;

    const baselineMean = mean(baseline);
    return baselineMean > 0 ? mean(recent) / baselineMean - 1 : 0;
  }

  buildSnapshot(symbol: string, candles: Candle[]): MarketSnapshot | undefined {
    if (candles.length === 0) {
      return undefined;
    }

    const closes = candles.map((candle) => candle.close);
    const snapshot: MarketSnapshot = {
      symbol,
      price: closes[closes.length - 1],
      volatility: this.calculateVolatility(closes),
      volumeTrend: this.calculateVolumeTrend(candles.map((candle) => candle.volume)),
    };
    this.lastPrices.set(symbol, snapshot.price);

    this.logger.debug(
      `${symbol}: Price=${snapshot.price}, Volatility=${snapshot.volatility.toFixed(4)}, ` +
      `Volume trend=${snapshot.volumeTrend.toFixed(2)}`,
    );

    return snapshot;
  }

  getLastPrice(symbol: string): number | undefined {
    return this.lastPrices.get(symbol);
  }
}
