import { Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../../config/engine-config.service';
import { EngineErrorKind } from '../../common/errors/engine.errors';
import {
  PositionSizingParams,
  RiskTierConfig,
  SizingResult,
} from '../interfaces/risk-management.interface';
import {
  MAX_VOLATILITY,
  RISK_SCORE_WEIGHTS,
  RISK_TIERS,
  SOFT_BREAKER_LOSSES,
} from '../risk-management.constants';

// Допуск на двоичное округление при переводе стоимости в контракты
const CONTRACT_EPSILON = 1e-9;
const HIGH_EXPOSURE_RATIO = 0.5;
const HIGH_EXPOSURE_FACTOR = 0.7;

@Injectable()
export class PositionSizingService {
  private readonly logger = new Logger(PositionSizingService.name);

  constructor(private engineConfig: EngineConfigService) {}

  /**
   * Средства, доступные для торговли после вычета резерва
   */
  calculateAvailableFunds(totalBalance: number): number {
    const reserve = totalBalance * this.engineConfig.settings.reserveFraction;
    return Math.max(0, totalBalance - reserve);
  }

  /**
   * Риск-скор 0..1, где 1 — минимальный риск
   */
  calculateRiskScore(
    volatility: number,
    winRate: number,
    consecutiveLosses: number,
    signalStrength: number,
  ): number {
    const volatilityScore = Math.max(0, 1 - volatility / MAX_VOLATILITY);
    const winRateScore = winRate / 100;
    const lossScore = Math.max(0, 1 - consecutiveLosses * 0.2);
    const signalScore = signalStrength / 100;

    const riskScore =
      volatilityScore * RISK_SCORE_WEIGHTS.volatility +
      winRateScore * RISK_SCORE_WEIGHTS.winRate +
      lossScore * RISK_SCORE_WEIGHTS.losses +
      signalScore * RISK_SCORE_WEIGHTS.signal;

    return Math.max(0, Math.min(1, riskScore));
  }

  getRiskTier(volatility: number): RiskTierConfig {
    return RISK_TIERS.find((tier) => volatility <= tier.volatilityMax) ?? RISK_TIERS[RISK_TIERS.length - 1];
  }

  /**
   * Процент доступных средств под позицию, до перевода в контракты
   */
  calculatePositionPercent(params: PositionSizingParams): { percent: number; riskScore: number; tier: RiskTierConfig } {
    const { basePositionSizePercent, minPositionSizePercent, maxPositionSizePercent } = this.engineConfig.settings;

    const riskScore = this.calculateRiskScore(
      params.volatility,
      params.winRate,
      params.consecutiveLosses,
      params.signalStrength,
    );
    const tier = this.getRiskTier(params.volatility);

    let percent = basePositionSizePercent * riskScore * tier.sizeMultiplier;
    percent = Math.max(minPositionSizePercent, Math.min(maxPositionSizePercent, percent));

    // Уже открыто больше половины средств — новая позиция меньше
    if (params.availableBalance > 0 && params.existingExposure / params.availableBalance > HIGH_EXPOSURE_RATIO) {
      percent = Math.max(minPositionSizePercent, percent * HIGH_EXPOSURE_FACTOR);
    }

    if (params.consecutiveLosses >= SOFT_BREAKER_LOSSES) {
      percent = minPositionSizePercent;
    }

    return { percent, riskScore, tier };
  }

  /**
   * Рассчитывает размер позиции в контрактах на основе риска, волатильности и истории
   */
  calculatePositionSize(params: PositionSizingParams): SizingResult {
    const { availableBalance, price, leverage } = params;
    const { minPositionValue } = this.engineConfig.settings;

    if (availableBalance <= 0 || price <= 0 || leverage <= 0) {
      return {
        kind: 'rejected',
        errorKind: EngineErrorKind.INSUFFICIENT_FUNDS,
        reason: `Нет средств для позиции: доступно $${availableBalance.toFixed(2)}`,
      };
    }

    const { percent, riskScore, tier } = this.calculatePositionPercent(params);
    let positionValue = availableBalance * (percent / 100);

    if (minPositionValue > positionValue) {
      if (availableBalance < minPositionValue) {
        return {
          kind: 'rejected',
          errorKind: EngineErrorKind.INSUFFICIENT_FUNDS,
          reason:
            `Доступно $${availableBalance.toFixed(2)}, ` +
            `минимальная позиция $${minPositionValue.toFixed(2)}`,
        };
      }
      positionValue = minPositionValue;
    }

    let contracts = Math.floor((positionValue * leverage) / price + CONTRACT_EPSILON);

    if (contracts < 1) {
      if ((availableBalance * leverage) / price + CONTRACT_EPSILON < 1) {
        return {
          kind: 'rejected',
          errorKind: EngineErrorKind.INSUFFICIENT_FUNDS,
          reason:
            `Недостаточно средств даже на 1 контракт: доступно $${availableBalance.toFixed(2)}, ` +
            `нужно $${(price / leverage).toFixed(2)}`,
        };
      }
      contracts = 1;
      positionValue = price / leverage;
    }

    this.logger.debug(
      `Position sizing: Available=${availableBalance.toFixed(2)}, ` +
      `Risk score=${riskScore.toFixed(3)}, Tier=${tier.tier} (x${tier.sizeMultiplier}), ` +
      `Percent=${percent.toFixed(2)}%, Value=${positionValue.toFixed(2)}, ` +
      `Leverage=${leverage}x, Contracts=${contracts}`,
    );

    return {
      kind: 'sized',
      contracts,
      value: positionValue,
      positionPercent: percent,
      riskScore,
      tier: tier.tier,
    };
  }

  /**
   * Максимальный убыток позиции при срабатывании стоп-лосса
   */
  calculateMaxLoss(contracts: number, entryPrice: number, leverage: number, stopLossPercent: number): number {
    const margin = (contracts * entryPrice) / leverage;
    return margin * (stopLossPercent / 100);
  }
}
