import { Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../config/engine-config.service';
import { EngineErrorKind } from '../common/errors/engine.errors';
import { PositionSizingService } from './services/position-sizing.service';
import { PositionSizingParams, TradeGateResult } from './interfaces/risk-management.interface';
import { RiskDecision } from './dto/risk-decision.dto';
import { HARD_BREAKER_LOSSES, SOFT_BREAKER_LOSSES } from './risk-management.constants';

@Injectable()
export class RiskManagementService {
  private readonly logger = new Logger(RiskManagementService.name);

  constructor(
    private engineConfig: EngineConfigService,
    private positionSizingService: PositionSizingService,
  ) {}

  /**
   * Финальная проверка сделки. Закрыта по умолчанию: любое нарушение — отказ
   */
  shouldAllowTrade(availableFunds: number, positionValue: number, consecutiveLosses: number): TradeGateResult {
    if (consecutiveLosses >= HARD_BREAKER_LOSSES) {
      return {
        allowed: false,
        errorKind: EngineErrorKind.CIRCUIT_BREAKER_OPEN,
        reason: `Слишком много убытков подряд (${consecutiveLosses}), торговля приостановлена`,
      };
    }

    if (availableFunds <= 0) {
      return {
        allowed: false,
        errorKind: EngineErrorKind.INSUFFICIENT_FUNDS,
        reason: `Недостаточно средств после резерва: $${availableFunds.toFixed(2)}`,
      };
    }

    if (positionValue > availableFunds) {
      return {
        allowed: false,
        errorKind: EngineErrorKind.INSUFFICIENT_FUNDS,
        reason: `Позиция $${positionValue.toFixed(2)} больше доступных средств $${availableFunds.toFixed(2)}`,
      };
    }

    if (consecutiveLosses >= SOFT_BREAKER_LOSSES) {
      const maxValue = availableFunds * (this.engineConfig.settings.minPositionSizePercent / 100);
      if (positionValue > maxValue) {
        return {
          allowed: false,
          errorKind: EngineErrorKind.CIRCUIT_BREAKER_OPEN,
          reason: `После ${consecutiveLosses} убытков разрешен только минимальный размер позиции ($${maxValue.toFixed(2)})`,
        };
      }
    }

    return { allowed: true, reason: 'Все риск-проверки пройдены успешно' };
  }

  /**
   * Основная функция оценки риска перед входом в позицию
   */
  evaluateTradeRisk(params: PositionSizingParams): RiskDecision {
    // Аварийный стоп и пустой баланс проверяем до расчета размера
    const precheck = this.shouldAllowTrade(params.availableBalance, 0, params.consecutiveLosses);
    if (!precheck.allowed) {
      return this.createRejectionDecision(precheck.errorKind, precheck.reason);
    }

    const sizing = this.positionSizingService.calculatePositionSize(params);

    if (sizing.kind === 'rejected') {
      return this.createRejectionDecision(sizing.errorKind, sizing.reason);
    }

    const gate = this.shouldAllowTrade(params.availableBalance, sizing.value, params.consecutiveLosses);
    if (!gate.allowed) {
      return this.createRejectionDecision(gate.errorKind, gate.reason);
    }

    return {
      canTrade: true,
      contracts: sizing.contracts,
      positionValue: sizing.value,
      positionPercent: sizing.positionPercent,
      riskScore: sizing.riskScore,
      riskTier: sizing.tier,
      reason: gate.reason,
    };
  }

  private createRejectionDecision(errorKind: EngineErrorKind, reason: string): RiskDecision {
    this.logger.debug(`Сделка отклонена (${errorKind}): ${reason}`);
    return { canTrade: false, errorKind, reason };
  }
}
