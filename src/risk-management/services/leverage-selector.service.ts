import { Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../../config/engine-config.service';
import { LeverageFactors, LeverageParams } from '../interfaces/risk-management.interface';
import { LEVERAGE_WEIGHTS, MAX_VOLATILITY } from '../risk-management.constants';

const LOSS_PENALTY = 0.15;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

@Injectable()
export class LeverageSelectorService {
  private readonly logger = new Logger(LeverageSelectorService.name);

  constructor(private engineConfig: EngineConfigService) {}

  /**
   * Три фактора риска: волатильность, качество сигнала, недавние результаты
   */
  calculateFactors(params: LeverageParams): LeverageFactors {
    const volatilityFactor = 1 - clamp01(Math.max(0, params.volatility) / MAX_VOLATILITY);
    const conditionFactor = clamp01(params.signalConfidence);
    const lossPenalty = Math.max(0, 1 - (params.consecutiveLosses ?? 0) * LOSS_PENALTY);
    const performanceFactor = clamp01(params.recentWinRate / 100) * lossPenalty;

    const composite = clamp01(
      volatilityFactor * LEVERAGE_WEIGHTS.volatility +
      conditionFactor * LEVERAGE_WEIGHTS.condition +
      performanceFactor * LEVERAGE_WEIGHTS.performance,
    );

    return { volatilityFactor, conditionFactor, performanceFactor, composite };
  }

  /**
   * Подбирает плечо в пределах [min, max]: чем спокойнее рынок и увереннее сигнал, тем выше
   */
  selectLeverage(params: LeverageParams): number {
    const settings = this.engineConfig.settings;
    const minLeverage = params.minLeverage ?? settings.minLeverage;
    const maxLeverage = params.maxLeverage ?? settings.maxLeverage;
    const baseLeverage = params.baseLeverage ?? settings.baseLeverage;

    if (!settings.dynamicLeverage) {
      return this.clamp(baseLeverage, minLeverage, maxLeverage);
    }

    const factors = this.calculateFactors(params);
    const leverage = this.clamp(
      Math.round(minLeverage + factors.composite * (maxLeverage - minLeverage)),
      minLeverage,
      maxLeverage,
    );

    this.logger.debug(
      `Leverage: Volatility=${factors.volatilityFactor.toFixed(2)}, ` +
      `Condition=${factors.conditionFactor.toFixed(2)}, ` +
      `Performance=${factors.performanceFactor.toFixed(2)}, ` +
      `Composite=${factors.composite.toFixed(2)} -> ${leverage}x`,
    );

    return leverage;
  }

  getConservativeLeverage(): number {
    const { baseLeverage, minLeverage } = this.engineConfig.settings;
    return Math.max(minLeverage, Math.floor(baseLeverage / 2));
  }

  getAggressiveLeverage(): number {
    const { baseLeverage, maxLeverage } = this.engineConfig.settings;
    return Math.min(maxLeverage, Math.floor(baseLeverage * 1.5));
  }

  private clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
  }
}
