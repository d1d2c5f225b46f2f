import { RiskTierConfig } from './interfaces/risk-management.interface';

// Подряд идущие убытки: 3 — только минимальный размер, 5 — полный стоп по инструменту
export const SOFT_BREAKER_LOSSES = 3;
export const HARD_BREAKER_LOSSES = 5;

export const RISK_TIERS: readonly RiskTierConfig[] = [
  { tier: 'low', volatilityMax: 0.02, sizeMultiplier: 1.5 },
  { tier: 'medium', volatilityMax: 0.05, sizeMultiplier: 1.0 },
  { tier: 'high', volatilityMax: Number.POSITIVE_INFINITY, sizeMultiplier: 0.6 },
];

export const RISK_SCORE_WEIGHTS = {
  volatility: 0.3,
  winRate: 0.25,
  losses: 0.25,
  signal: 0.2,
} as const;

export const LEVERAGE_WEIGHTS = {
  volatility: 0.4,
  condition: 0.3,
  performance: 0.3,
} as const;

// Волатильность выше 10% считается максимальной
export const MAX_VOLATILITY = 0.1;

// Вход запрещен при |корреляции| цены выше порога с любой открытой парой
export const MAX_CORRELATION = 0.7;
export const PRICE_HISTORY_LIMIT = 100;
export const MIN_CORRELATION_POINTS = 30;
