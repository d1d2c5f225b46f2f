import { OrderSide } from '../../trading/interfaces/trading.interface';

export interface PositionLeg {
  side: OrderSide;
  entryPrice: number;
  size: number;
  leverage: number;
}

export interface Position extends PositionLeg {
  stopLoss: number;
  takeProfit: number;
  // лучшая цена с момента входа: максимум для long, минимум для short
  trailingExtreme: number;
  unrealizedPnl: number;
  openedAt: Date;
  hedge?: PositionLeg;
}

export enum LifecycleState {
  FLAT = 'FLAT',
  OPEN_LONG = 'OPEN_LONG',
  OPEN_SHORT = 'OPEN_SHORT',
  HEDGED_LONG = 'HEDGED_LONG',
  HEDGED_SHORT = 'HEDGED_SHORT',
}

export type ExitReason = 'stop-loss' | 'take-profit' | 'trailing-stop';

export type LifecycleIntent =
  | { kind: 'hold'; reason: string }
  | { kind: 'open'; side: OrderSide; reason: string }
  | { kind: 'close'; exitReason: ExitReason; pnl: number; reason: string }
  | { kind: 'hedge'; side: OrderSide; size: number; reason: string };

export interface ClosedPosition {
  position: Position;
  exitPrice: number;
  pnl: number;
}
