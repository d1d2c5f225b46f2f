import { Signal } from '../../trading/interfaces/trading.interface';

export interface StrategyInterface {
  readonly timeframe: string;
  readonly candleLimit: number;
  analyze(symbol: string, closes: number[]): Signal;
}
