import { EngineErrorKind } from '../../common/errors/engine.errors';

export type RiskTier = 'low' | 'medium' | 'high';

export interface RiskTierConfig {
  tier: RiskTier;
  volatilityMax: number;
  sizeMultiplier: number;
}

export interface PositionSizingParams {
  availableBalance: number;
  price: number;
  leverage: number;
  volatility: number;
  winRate: number; // 0-100
  consecutiveLosses: number;
  signalStrength: number; // 0-100
  existingExposure: number;
}

export type SizingResult =
  | {
      kind: 'sized';
      contracts: number;
      value: number;
      positionPercent: number;
      riskScore: number;
      tier: RiskTier;
    }
  | {
      kind: 'rejected';
      errorKind: EngineErrorKind;
      reason: string;
    };

export type TradeGateResult =
  | { allowed: true; reason: string }
  | { allowed: false; errorKind: EngineErrorKind; reason: string };

export interface LeverageParams {
  baseLeverage?: number;
  minLeverage?: number;
  maxLeverage?: number;
  volatility: number;
  signalConfidence: number; // 0-1
  recentWinRate: number; // 0-100
  consecutiveLosses?: number;
}

export interface LeverageFactors {
  volatilityFactor: number;
  conditionFactor: number;
  performanceFactor: number;
  composite: number;
}

export interface CircuitBreakerState {
  symbol: string;
  trippedAtCycle: number;
  consecutiveLosses: number;
}

export interface CorrelatedPair {
  symbol: string;
  correlation: number;
}

export type DiversificationResult =
  | { allowed: true; reason: string }
  | { allowed: false; reason: string; correlated: CorrelatedPair[] };
