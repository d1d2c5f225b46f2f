import { EngineErrorKind } from '../../common/errors/engine.errors';
import { RiskTier } from '../interfaces/risk-management.interface';

export type RiskDecision =
  | {
      canTrade: true;
      contracts: number;
      positionValue: number;
      positionPercent: number;
      riskScore: number;
      riskTier: RiskTier;
      reason: string;
    }
  | {
      canTrade: false;
      errorKind: EngineErrorKind;
      reason: string;
    };
