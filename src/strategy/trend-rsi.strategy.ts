import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as techIndicators from 'technicalindicators';
import { Signal } from '../trading/interfaces/trading.interface';
import { StrategyInterface } from './interfaces/strategy.interface';

const CROSS_BASE_STRENGTH = 70;
const RSI_EXIT_BASE_STRENGTH = 60;
const RSI_BONUS_PER_POINT = 2;

@Injectable()
export class TrendRsiStrategy implements StrategyInterface {
  private readonly logger = new Logger(TrendRsiStrategy.name);
  readonly timeframe: string;
  readonly candleLimit = 200;
  private rsiPeriod: number;
  private rsiOverbought: number;
  private rsiOversold: number;
  private emaShortPeriod: number;
  private emaLongPeriod: number;

  constructor(private configService: ConfigService) {
    this.timeframe = this.configService.get<string>('TIMEFRAME') || '15m';
    this.rsiPeriod = parseInt(this.configService.get<string>('RSI_PERIOD') || '14');
    this.rsiOverbought = parseInt(this.configService.get<string>('RSI_OVERBOUGHT') || '70');
    this.rsiOversold = parseInt(this.configService.get<string>('RSI_OVERSOLD') || '30');
    this.emaShortPeriod = parseInt(this.configService.get<string>('EMA_SHORT_PERIOD') || '9');
    this.emaLongPeriod = parseInt(this.configService.get<string>('EMA_LONG_PERIOD') || '21');
  }

  /**
   * Сигнал по закрытиям (от старых к новым). Сила растет с глубиной RSI за порогом
   */
  analyze(symbol: string, closes: number[]): Signal {
    if (closes.length === 0) {
      return { action: 'hold', strength: 0, reason: 'Недостаточно данных для анализа' };
    }

    const rsiValues = this.calculateRSI(closes, this.rsiPeriod);
    const emaShort = this.calculateEMA(closes, this.emaShortPeriod);
    const emaLong = this.calculateEMA(closes, this.emaLongPeriod);

    if (rsiValues.length < 2 || emaShort.length < 2 || emaLong.length < 2) {
      return { action: 'hold', strength: 0, reason: 'Недостаточно данных для анализа' };
    }

    const lastRsi = rsiValues[rsiValues.length - 1];
    const prevRsi = rsiValues[rsiValues.length - 2];
    const lastEmaShort = emaShort[emaShort.length - 1];
    const lastEmaLong = emaLong[emaLong.length - 1];
    const prevEmaShort = emaShort[emaShort.length - 2];
    const prevEmaLong = emaLong[emaLong.length - 2];

    this.logger.debug(`${symbol}: RSI: ${lastRsi}, EMA Short: ${lastEmaShort}, EMA Long: ${lastEmaLong}`);

    if (prevEmaShort < prevEmaLong && lastEmaShort > lastEmaLong && lastRsi < this.rsiOversold) {
      return {
        action: 'buy',
        strength: this.strength(CROSS_BASE_STRENGTH, this.rsiOversold - lastRsi),
        reason: `Сигнал на покупку: пересечение EMA (${this.emaShortPeriod}>${this.emaLongPeriod}) и RSI (${lastRsi.toFixed(2)}) в зоне перепроданности`,
      };
    }

    if (prevEmaShort > prevEmaLong && lastEmaShort < lastEmaLong && lastRsi > this.rsiOverbought) {
      return {
        action: 'sell',
        strength: this.strength(CROSS_BASE_STRENGTH, lastRsi - this.rsiOverbought),
        reason: `Сигнал на продажу: пересечение EMA (${this.emaShortPeriod}<${this.emaLongPeriod}) и RSI (${lastRsi.toFixed(2)}) в зоне перекупленности`,
      };
    }

    if (prevRsi < this.rsiOversold && lastRsi > this.rsiOversold && lastEmaShort > lastEmaLong) {
      return {
        action: 'buy',
        strength: this.strength(RSI_EXIT_BASE_STRENGTH, lastRsi - this.rsiOversold),
        reason: `Сигнал на покупку: RSI (${lastRsi.toFixed(2)}) вышел из зоны перепроданности и тренд восходящий`,
      };
    }

    if (prevRsi < this.rsiOverbought && lastRsi > this.rsiOverbought && lastEmaShort < lastEmaLong) {
      return {
        action: 'sell',
        strength: this.strength(RSI_EXIT_BASE_STRENGTH, lastRsi - this.rsiOverbought),
        reason: `Сигнал на продажу: RSI (${lastRsi.toFixed(2)}) вошел в зону перекупленности и тренд нисходящий`,
      };
    }

    return { action: 'hold', strength: 0, reason: 'Нет четкого сигнала' };
  }

  private strength(base: number, rsiDistance: number): number {
    return Math.min(100, base + Math.max(0, rsiDistance) * RSI_BONUS_PER_POINT);
  }

  private calculateRSI(prices: number[], period: number): number[] {
    return techIndicators.RSI.calculate({ values: prices, period });
  }

  private calculateEMA(prices: number[], period: number): number[] {
    return techIndicators.EMA.calculate({ values: prices, period });
  }
}
