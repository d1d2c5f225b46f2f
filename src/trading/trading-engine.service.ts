import { Inject, Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../config/engine-config.service';
import { EngineError, EngineErrorKind, formatContext } from '../common/errors/engine.errors';
import { AllocationLedgerService } from '../allocation/allocation-ledger.service';
import { PairRanking } from '../allocation/dto/pair-ranking.dto';
import { TradeStats } from '../allocation/interfaces/allocation.interface';
import { PositionLifecycleService } from '../position/position-lifecycle.service';
import { LifecycleIntent, LifecycleState } from '../position/interfaces/position.interface';
import { RiskManagementService } from '../risk-management/risk-management.service';
import { CircuitBreakerService } from '../risk-management/services/circuit-breaker.service';
import { LeverageSelectorService } from '../risk-management/services/leverage-selector.service';
import { DiversificationService } from '../risk-management/services/diversification.service';
import { TradeDecision } from './dto/trade-decision.dto';
import { AllocationReport } from './dto/allocation-report.dto';
import {
  EXECUTION_PORT,
  ExecutionPort,
  MarketSnapshot,
  OrderSide,
  Signal,
} from './interfaces/trading.interface';

const DEFAULT_WIN_RATE = 50;

/**
 * Один шаг движка по инструменту: плечо, доля, размер, жизненный цикл позиции, исполнение.
 * Состояние меняется только после успешного вызова биржи.
 */
@Injectable()
export class TradingEngineService {
  private readonly logger = new Logger(TradingEngineService.name);
  private cycle = 0;
  // Пары, по которым сейчас идет вызов биржи
  private readonly pending = new Set<string>();

  constructor(
    private engineConfig: EngineConfigService,
    private riskManagementService: RiskManagementService,
    private leverageSelector: LeverageSelectorService,
    private circuitBreaker: CircuitBreakerService,
    private ledger: AllocationLedgerService,
    private lifecycle: PositionLifecycleService,
    private diversification: DiversificationService,
    @Inject(EXECUTION_PORT) private executionPort: ExecutionPort,
  ) {}

  getCycle(): number {
    return this.cycle;
  }

  getSymbols(): string[] {
    return this.ledger.symbols();
  }

  beginCycle(totalBalance: number) {
    this.cycle += 1;
    this.ledger.updateAccountBalance(totalBalance);
  }

  /**
   * Восстановимые ошибки дают решение 'none' только для этого инструмента
   */
  async evaluateCycle(symbol: string, snapshot: MarketSnapshot, signal: Signal): Promise<TradeDecision> {
    this.pending.add(symbol);
    try {
      return await this.decide(symbol, snapshot, signal);
    } catch (error) {
      if (error instanceof EngineError && error.recoverable) {
        this.logger.warn(`${symbol}: ${error.message} (${formatContext(error.context)})`);
        return this.none(symbol, error.message, error.kind);
      }
      throw error;
    } finally {
      this.pending.delete(symbol);
    }
  }

  /**
   * Учет закрытой сделки: винрейт и серия убытков пары
   */
  onTradeClosed(symbol: string, pnl: number, wasWin: boolean) {
    const stats = this.ledger.recordTradeResult(symbol, pnl, wasWin);
    if (stats && stats.consecutiveLosses > 0) {
      this.logger.warn(`${symbol}: убытков подряд ${stats.consecutiveLosses}`);
    }
  }

  getRankings(): PairRanking[] {
    return this.ledger.getPairRankings();
  }

  getAllocationReport(): AllocationReport {
    return {
      cycle: this.cycle,
      totalBalance: this.ledger.getTotalBalance(),
      reservedBalance: this.ledger.getReservedBalance(),
      availableBalance: this.ledger.getAvailableBalance(),
      totalAllocated: this.ledger.getTotalAllocated(),
      instruments: this.ledger
        .snapshot()
        .map((item) => ({ ...item, state: this.lifecycle.getState(item.symbol) })),
      trippedBreakers: this.circuitBreaker.getTripped(),
    };
  }

  /**
   * Ручной сброс аварийной остановки и серии убытков
   */
  resetCircuitBreaker(symbol: string): boolean {
    if (!this.ledger.has(symbol)) {
      return false;
    }
    this.circuitBreaker.reset(symbol);
    this.ledger.resetConsecutiveLosses(symbol);
    return true;
  }

  addInstrument(symbol: string): boolean {
    return this.ledger.addInstrument(symbol);
  }

  removeInstrument(symbol: string): boolean {
    if (this.lifecycle.hasPosition(symbol)) {
      this.logger.warn(`Нельзя удалить ${symbol}: позиция еще открыта`);
      return false;
    }
    if (this.pending.has(symbol)) {
      this.logger.warn(`Нельзя удалить ${symbol}: ордер еще исполняется`);
      return false;
    }
    const removed = this.ledger.removeInstrument(symbol);
    if (removed) {
      this.circuitBreaker.reset(symbol);
      this.diversification.forget(symbol);
    }
    return removed;
  }

  private async decide(symbol: string, snapshot: MarketSnapshot, signal: Signal): Promise<TradeDecision> {
    const stats = this.ledger.getStatistics(symbol);
    if (!stats) {
      return this.none(symbol, `Пара ${symbol} не торгуется`);
    }
    this.diversification.recordPrice(symbol, snapshot.price);

    const breaker = this.circuitBreaker.evaluate(symbol, stats.consecutiveLosses, this.cycle);
    if (breaker === 'expired') {
      this.ledger.resetConsecutiveLosses(symbol);
      stats.consecutiveLosses = 0;
    }

    const state = this.lifecycle.getState(symbol);
    if (breaker === 'open' && state === LifecycleState.FLAT) {
      return this.none(
        symbol,
        `Аварийная остановка: ${stats.consecutiveLosses} убытков подряд`,
        EngineErrorKind.CIRCUIT_BREAKER_OPEN,
      );
    }

    const intent: LifecycleIntent = this.lifecycle.evaluate(symbol, snapshot, signal);

    switch (intent.kind) {
      case 'hold':
        return this.none(symbol, intent.reason);
      case 'open':
        if (breaker === 'open') {
          return this.none(symbol, 'Аварийная остановка: вход запрещен', EngineErrorKind.CIRCUIT_BREAKER_OPEN);
        }
        return this.openPosition(symbol, intent.side, snapshot, signal, stats);
      case 'close':
        return this.closePosition(symbol, snapshot, intent.reason);
      case 'hedge':
        return this.hedgePosition(symbol, intent.side, intent.size, snapshot, signal, stats, intent.reason);
    }
  }

  private async openPosition(
    symbol: string,
    side: OrderSide,
    snapshot: MarketSnapshot,
    signal: Signal,
    stats: TradeStats,
  ): Promise<TradeDecision> {
    const diversification = this.diversification.checkDiversification(symbol, this.lifecycle.openSymbols());
    if (!diversification.allowed) {
      return this.none(symbol, diversification.reason, EngineErrorKind.DIVERSIFICATION_LIMIT);
    }

    const { minPositionValue, signalStrengthThreshold } = this.engineConfig.settings;
    const winRate = this.ledger.getWinRatePercent(symbol, DEFAULT_WIN_RATE);
    const leverage = this.selectLeverage(snapshot, signal, winRate, stats);

    let allocation = this.ledger.getAllocation(symbol);
    if (allocation < minPositionValue && signal.strength >= signalStrengthThreshold) {
      const boost = this.ledger.boostAllocationForSignal(symbol, signal);
      this.logger.log(`${symbol}: перераспределение ${boost.status}`);
      allocation = this.ledger.getAllocation(symbol);
    }

    if (allocation < minPositionValue) {
      this.logger.warn(
        `❌ ${symbol}: доля $${allocation.toFixed(2)} меньше минимальной позиции $${minPositionValue.toFixed(2)}`,
      );
      return this.none(
        symbol,
        `Доля $${allocation.toFixed(2)} меньше минимальной позиции $${minPositionValue.toFixed(2)}`,
        EngineErrorKind.REDISTRIBUTION_EXHAUSTED,
        leverage,
      );
    }

    const decision = this.riskManagementService.evaluateTradeRisk({
      availableBalance: allocation,
      price: snapshot.price,
      leverage,
      volatility: snapshot.volatility,
      winRate,
      consecutiveLosses: stats.consecutiveLosses,
      signalStrength: signal.strength,
      existingExposure: this.lifecycle.getMarginInUse(),
    });

    if (!decision.canTrade) {
      this.logger.warn(`❌ ${symbol}: сделка отклонена: ${decision.reason}`);
      return this.none(symbol, decision.reason, decision.errorKind, leverage);
    }

    await this.executionPort.placeOrder(symbol, side, decision.contracts, leverage);
    this.lifecycle.applyOpen(symbol, side, snapshot.price, decision.contracts, leverage);
    this.ledger.setOpenPosition(symbol, true);

    this.logger.log(
      `✅ ${symbol}: ${side} ${decision.contracts} контрактов | ` +
      `Стоимость: $${decision.positionValue.toFixed(2)} (${decision.positionPercent.toFixed(2)}%) | ` +
      `Риск: ${decision.riskTier} | Плечо: ${leverage}x`,
    );

    return {
      symbol,
      action: 'open',
      side,
      size: decision.contracts,
      leverage,
      reason: signal.reason ?? decision.reason,
    };
  }

  private async closePosition(symbol: string, snapshot: MarketSnapshot, reason: string): Promise<TradeDecision> {
    await this.executionPort.closePosition(symbol);

    const closed = this.lifecycle.applyClose(symbol, snapshot.price);
    this.ledger.setOpenPosition(symbol, false);
    if (!closed) {
      return this.none(symbol, 'Позиция уже закрыта');
    }

    this.onTradeClosed(symbol, closed.pnl, closed.pnl > 0);

    return {
      symbol,
      action: 'close',
      side: closed.position.side,
      size: closed.position.size,
      leverage: closed.position.leverage,
      reason,
      pnl: closed.pnl,
    };
  }

  private async hedgePosition(
    symbol: string,
    side: OrderSide,
    size: number,
    snapshot: MarketSnapshot,
    signal: Signal,
    stats: TradeStats,
    reason: string,
  ): Promise<TradeDecision> {
    const winRate = this.ledger.getWinRatePercent(symbol, DEFAULT_WIN_RATE);
    const leverage = this.selectLeverage(snapshot, signal, winRate, stats);

    await this.executionPort.placeOrder(symbol, side, size, leverage);
    this.lifecycle.applyHedge(symbol, snapshot.price, size, leverage);

    return { symbol, action: 'hedge', side, size, leverage, reason };
  }

  private selectLeverage(snapshot: MarketSnapshot, signal: Signal, winRate: number, stats: TradeStats): number {
    return this.leverageSelector.selectLeverage({
      volatility: snapshot.volatility,
      signalConfidence: signal.confidence ?? signal.strength / 100,
      recentWinRate: winRate,
      consecutiveLosses: stats.consecutiveLosses,
    });
  }

  private none(symbol: string, reason: string, errorKind?: EngineErrorKind, leverage = 0): TradeDecision {
    return { symbol, action: 'none', size: 0, leverage, reason, errorKind };
  }
}
