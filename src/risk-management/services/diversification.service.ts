import { Injectable, Logger } from '@nestjs/common';
import { CorrelatedPair, DiversificationResult } from '../interfaces/risk-management.interface';
import { MAX_CORRELATION, MIN_CORRELATION_POINTS, PRICE_HISTORY_LIMIT } from '../risk-management.constants';

/**
 * Диверсификация портфеля: не открываем пару, цена которой ходит вместе с уже открытыми
 */
@Injectable()
export class DiversificationService {
  private readonly logger = new Logger(DiversificationService.name);
  private readonly priceHistory = new Map<string, number[]>();

  recordPrice(symbol: string, price: number) {
    const history = this.priceHistory.get(symbol) ?? [];
    history.push(price);
    if (history.length > PRICE_HISTORY_LIMIT) {
      history.splice(0, history.length - PRICE_HISTORY_LIMIT);
    }
    this.priceHistory.set(symbol, history);
  }

  forget(symbol: string) {
    this.priceHistory.delete(symbol);
  }

  /**
   * Корреляция Пирсона по последним общим точкам; 0, пока истории меньше 30 цен
   */
  calculateCorrelation(first: string, second: string): number {
    const a = this.priceHistory.get(first) ?? [];
    const b = this.priceHistory.get(second) ?? [];
    if (a.length < MIN_CORRELATION_POINTS || b.length < MIN_CORRELATION_POINTS) {
      return 0;
    }

    const length = Math.min(a.length, b.length);
    const xs = a.slice(-length);
    const ys = b.slice(-length);
    const meanX = xs.reduce((sum, value) => sum + value, 0) / length;
    const meanY = ys.reduce((sum, value) => sum + value, 0) / length;

    let covariance = 0;
    let varianceX = 0;
    let varianceY = 0;
    for (let i = 0; i < length; i++) {
      const dx = xs[i] - meanX;
      const dy = ys[i] - meanY;
      covariance += dx * dy;
      varianceX += dx * dx;
      varianceY += dy * dy;
    }

    // Постоянная цена: корреляция не определена
    if (varianceX === 0 || varianceY === 0) {
      return 0;
    }
    return covariance / Math.sqrt(varianceX * varianceY);
  }

  checkDiversification(symbol: string, openSymbols: string[]): DiversificationResult {
    const others = openSymbols.filter((other) => other !== symbol);
    if (others.length === 0) {
      return { allowed: true, reason: 'Нет открытых позиций' };
    }

    const correlated: CorrelatedPair[] = others
      .map((other) => ({ symbol: other, correlation: this.calculateCorrelation(symbol, other) }))
      .filter((pair) => Math.abs(pair.correlation) > MAX_CORRELATION);

    if (correlated.length > 0) {
      const pairs = correlated.map((pair) => `${pair.symbol} (${pair.correlation.toFixed(2)})`).join(', ');
      this.logger.warn(`${symbol}: высокая корреляция с ${pairs}`);
      return { allowed: false, reason: `Высокая корреляция с: ${pairs}`, correlated };
    }

    return { allowed: true, reason: 'Диверсификация в норме' };
  }
}
