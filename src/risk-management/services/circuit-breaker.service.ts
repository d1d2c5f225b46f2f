import { Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../../config/engine-config.service';
import { CircuitBreakerState } from '../interfaces/risk-management.interface';
import { HARD_BREAKER_LOSSES } from '../risk-management.constants';

/**
 * Жесткий стоп по инструменту после серии убытков.
 * Сбрасывается вручную или после заданного числа циклов.
 */
@Injectable()
export class CircuitBreakerService {
  private readonly logger = new Logger(CircuitBreakerService.name);
  private readonly tripped = new Map<string, CircuitBreakerState>();

  constructor(private engineConfig: EngineConfigService) {}

  /**
   * Обновляет состояние выключателя и сообщает, открыт ли он.
   * Возвращает 'expired', если время ожидания вышло и счетчик убытков пора обнулить.
   */
  evaluate(symbol: string, consecutiveLosses: number, cycle: number): 'closed' | 'open' | 'expired' {
    const state = this.tripped.get(symbol);

    if (!state) {
      if (consecutiveLosses < HARD_BREAKER_LOSSES) {
        return 'closed';
      }
      this.tripped.set(symbol, { symbol, trippedAtCycle: cycle, consecutiveLosses });
      this.logger.error(
        `🚨 Аварийная остановка по ${symbol}: ${consecutiveLosses} убытков подряд, ` +
        `пауза ${this.engineConfig.settings.circuitBreakerCooldownCycles} циклов`,
      );
      return 'open';
    }

    if (cycle - state.trippedAtCycle >= this.engineConfig.settings.circuitBreakerCooldownCycles) {
      this.tripped.delete(symbol);
      this.logger.log(`Пауза по ${symbol} истекла после ${cycle - state.trippedAtCycle} циклов`);
      return 'expired';
    }

    return 'open';
  }

  isOpen(symbol: string): boolean {
    return this.tripped.has(symbol);
  }

  /**
   * Сброс аварийной остановки (только вручную)
   */
  reset(symbol: string): boolean {
    const wasOpen = this.tripped.delete(symbol);
    if (wasOpen) {
      this.logger.log(`Аварийная остановка по ${symbol} сброшена вручную`);
    }
    return wasOpen;
  }

  getTripped(): CircuitBreakerState[] {
    return Array.from(this.tripped.values()).map((state) => ({ ...state }));
  }
}
