export type SignalAction = 'buy' | 'sell' | 'hold';

export interface Signal {
  action: SignalAction;
  strength: number; // 0-100
  confidence?: number; // 0-1
  reason?: string;
}

export interface MarketSnapshot {
  symbol: string;
  price: number;
  volatility: number;
  volumeTrend: number;
}

export type OrderSide = 'long' | 'short';

/**
 * Исполнение ордеров: биржа в LIVE режиме или бумажный счет
 */
export interface ExecutionPort {
  placeOrder(symbol: string, side: OrderSide, size: number, leverage: number): Promise<string>;
  closePosition(symbol: string): Promise<void>;
}

export interface BalanceSource {
  getTotalBalance(): Promise<number>;
}

export const EXECUTION_PORT = Symbol('EXECUTION_PORT');
export const BALANCE_SOURCE = Symbol('BALANCE_SOURCE');
