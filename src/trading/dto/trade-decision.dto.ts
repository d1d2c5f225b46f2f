import { EngineErrorKind } from '../../common/errors/engine.errors';
import { OrderSide } from '../interfaces/trading.interface';

export type TradeAction = 'none' | 'open' | 'close' | 'hedge';

export interface TradeDecision {
  symbol: string;
  action: TradeAction;
  side?: OrderSide;
  size: number;
  leverage: number;
  reason: string;
  errorKind?: EngineErrorKind;
  pnl?: number;
}
