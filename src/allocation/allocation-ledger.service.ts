import { Injectable, Logger } from '@nestjs/common';
import { EngineConfigService } from '../config/engine-config.service';
import {
  BoostOutcome,
  DonorTransfer,
  InstrumentAllocation,
  TradeStats,
} from './interfaces/allocation.interface';
import { PairRanking } from './dto/pair-ranking.dto';
import {
  allocate,
  compositeScore,
  findBestPair,
  hasHistory,
  winRateOf,
} from './strategies/allocation-strategies';

const EPSILON = 1e-9;
const RECENT_OUTCOMES_LIMIT = 10;
const STRONG_SIGNAL = 70;
const IDLE_DONOR_SHARE = 0.5;
const ACTIVE_DONOR_SHARE = 0.3;
const DONOR_FLOOR_SHARE = 0.05;
const TOP_DONOR_FLOOR_SHARE = 0.2;

function emptyStats(): TradeStats {
  return { wins: 0, losses: 0, totalTrades: 0, consecutiveLosses: 0, recentOutcomes: [] };
}

function copyAllocation(item: InstrumentAllocation): InstrumentAllocation {
  return { ...item, stats: { ...item.stats, recentOutcomes: [...item.stats.recentOutcomes] } };
}

/**
 * Распределение торгового баланса между инструментами.
 * Сумма долей никогда не превышает баланс за вычетом резерва.
 */
@Injectable()
export class AllocationLedgerService {
  private readonly logger = new Logger(AllocationLedgerService.name);
  private instruments = new Map<string, InstrumentAllocation>();
  private totalBalance = 0;

  constructor(private engineConfig: EngineConfigService) {
    for (const symbol of this.engineConfig.settings.tradingPairs) {
      this.instruments.set(symbol, this.createInstrument(symbol));
    }
    this.logger.log(
      `Менеджер пар инициализирован: ${this.instruments.size} пар (${this.symbols().join(', ')})`,
    );
  }

  symbols(): string[] {
    return Array.from(this.instruments.keys());
  }

  has(symbol: string): boolean {
    return this.instruments.has(symbol);
  }

  getTotalBalance(): number {
    return this.totalBalance;
  }

  getReservedBalance(): number {
    return this.totalBalance * this.engineConfig.settings.reserveFraction;
  }

  getAvailableBalance(): number {
    return Math.max(0, this.totalBalance - this.getReservedBalance());
  }

  getTotalAllocated(): number {
    let total = 0;
    this.instruments.forEach((item) => (total += item.allocatedBalance));
    return total;
  }

  getAllocation(symbol: string): number {
    return this.instruments.get(symbol)?.allocatedBalance ?? 0;
  }

  getInstrument(symbol: string): InstrumentAllocation | undefined {
    const item = this.instruments.get(symbol);
    return item ? copyAllocation(item) : undefined;
  }

  getStatistics(symbol: string): TradeStats | undefined {
    return this.getInstrument(symbol)?.stats;
  }

  snapshot(): InstrumentAllocation[] {
    return Array.from(this.instruments.values(), copyAllocation);
  }

  /**
   * Винрейт в процентах; для пары без истории возвращается fallback
   */
  getWinRatePercent(symbol: string, fallback = 50): number {
    const item = this.instruments.get(symbol);
    if (!item || !hasHistory(item.stats)) return fallback;
    return winRateOf(item.stats) * 100;
  }

  /**
   * Новый баланс аккаунта: доли пересчитываются по настроенной стратегии
   */
  updateAccountBalance(totalBalance: number) {
    this.totalBalance = Math.max(0, totalBalance);
    this.rebalance();
  }

  rebalance() {
    const strategy = this.engineConfig.settings.allocationStrategy;
    const available = this.getAvailableBalance();
    const allocations = allocate(strategy, available, Array.from(this.instruments.values()));

    this.commit(allocations);

    this.logger.log(
      `Баланс $${available.toFixed(2)} распределен между ${this.instruments.size} парами (${strategy.kind}): ` +
      this.snapshot()
        .map((item) => `${item.symbol}=$${item.allocatedBalance.toFixed(2)}`)
        .join(', '),
    );
  }

  /**
   * Ручная установка долей. Неизвестные символы игнорируются, отсутствующие получают 0
   */
  assign(allocations: Record<string, number>) {
    const balances = new Map<string, number>();
    this.instruments.forEach((_, symbol) => balances.set(symbol, Math.max(0, allocations[symbol] ?? 0)));
    this.commit(balances);
  }

  addInstrument(symbol: string): boolean {
    const normalized = symbol.trim().toUpperCase();
    if (!normalized || this.instruments.has(normalized)) {
      return false;
    }

    this.instruments.set(normalized, this.createInstrument(normalized));
    this.logger.log(`Пара ${normalized} добавлена в торговый список`);
    this.rebalance();
    return true;
  }

  /**
   * Удаляет пару; ее доля возвращается в общий пул через перераспределение
   */
  removeInstrument(symbol: string): boolean {
    const item = this.instruments.get(symbol);
    if (!item) {
      return false;
    }
    if (item.hasOpenPosition) {
      this.logger.warn(`Нельзя удалить ${symbol}: есть открытая позиция`);
      return false;
    }

    this.instruments.delete(symbol);
    this.logger.log(`Пара ${symbol} удалена, $${item.allocatedBalance.toFixed(2)} возвращено в пул`);
    this.rebalance();
    return true;
  }

  setOpenPosition(symbol: string, hasOpenPosition: boolean) {
    const item = this.instruments.get(symbol);
    if (item) {
      item.hasOpenPosition = hasOpenPosition;
    }
  }

  recordTradeResult(symbol: string, pnl: number, wasWin: boolean): TradeStats | undefined {
    const item = this.instruments.get(symbol);
    if (!item) {
      this.logger.warn(`Неизвестная торговая пара: ${symbol}`);
      return undefined;
    }

    const stats = item.stats;
    stats.totalTrades += 1;
    if (wasWin) {
      stats.wins += 1;
      stats.consecutiveLosses = 0;
    } else {
      stats.losses += 1;
      stats.consecutiveLosses += 1;
    }
    stats.recentOutcomes.push(wasWin);
    if (stats.recentOutcomes.length > RECENT_OUTCOMES_LIMIT) {
      stats.recentOutcomes.splice(0, stats.recentOutcomes.length - RECENT_OUTCOMES_LIMIT);
    }

    this.logger.log(
      `${symbol}: сделка ${wasWin ? 'в плюс' : 'в минус'} ${pnl.toFixed(2)} | ` +
      `W/L ${stats.wins}/${stats.losses} | убытков подряд: ${stats.consecutiveLosses}`,
    );

    return { ...stats, recentOutcomes: [...stats.recentOutcomes] };
  }

  resetConsecutiveLosses(symbol: string) {
    const item = this.instruments.get(symbol);
    if (item) {
      item.stats.consecutiveLosses = 0;
    }
  }

  /**
   * Перебрасывает капитал на пару с сильным сигналом, но недостаточной долей.
   * Сначала берем у пар без позиций, затем у активных; у каждого донора есть лимит и нижняя граница.
   */
  boostAllocationForSignal(symbol: string, signal: { strength: number }): BoostOutcome {
    const { minPositionValue, signalStrengthThreshold } = this.engineConfig.settings;
    const target = this.instruments.get(symbol);
    const before = target?.allocatedBalance ?? 0;

    if (!target) {
      return { status: 'not-needed', symbol, before, reason: 'неизвестная пара' };
    }
    if (signal.strength < signalStrengthThreshold) {
      return { status: 'not-needed', symbol, before, reason: `слабый сигнал (${signal.strength})` };
    }

    const balances = new Map<string, number>();
    this.instruments.forEach((item, key) => balances.set(key, item.allocatedBalance));

    const totalAllocated = this.getTotalAllocated();
    const targetPercent = signal.strength >= STRONG_SIGNAL ? 0.15 : 0.1;
    const targetValue = Math.max(minPositionValue, targetPercent * totalAllocated);
    const needed = targetValue - before;

    if (needed <= 0) {
      return { status: 'not-needed', symbol, before, reason: 'доли достаточно' };
    }

    const topHolder = this.findTopHolder();
    const byBalance = (a: InstrumentAllocation, b: InstrumentAllocation) => b.allocatedBalance - a.allocatedBalance;
    const donors = Array.from(this.instruments.values()).filter((item) => item.symbol !== symbol);
    const ordered = [
      ...donors.filter((item) => !item.hasOpenPosition).sort(byBalance),
      ...donors.filter((item) => item.hasOpenPosition).sort(byBalance),
    ];

    const transfers: DonorTransfer[] = [];
    let remaining = needed;

    for (const donor of ordered) {
      if (remaining <= EPSILON) break;

      const balance = donor.allocatedBalance;
      const floorShare = donor.symbol === topHolder ? TOP_DONOR_FLOOR_SHARE : DONOR_FLOOR_SHARE;
      const floor = Math.max(minPositionValue, floorShare * totalAllocated);
      const cap = balance * (donor.hasOpenPosition ? ACTIVE_DONOR_SHARE : IDLE_DONOR_SHARE);
      const amount = Math.min(cap, Math.max(0, balance - floor), remaining);

      if (amount > 0) {
        balances.set(donor.symbol, balance - amount);
        remaining -= amount;
        transfers.push({ donor: donor.symbol, amount });
        this.logger.log(`Перераспределено $${amount.toFixed(2)} с ${donor.symbol} на ${symbol}`);
      }
    }

    const transferred = transfers.reduce((sum, transfer) => sum + transfer.amount, 0);
    const figures = { symbol, before, after: before + transferred, needed, transferred, transfers };

    if (transferred <= 0) {
      this.logger.warn(
        `Не удалось перераспределить баланс на ${symbol}: нужно $${needed.toFixed(2)}, доноры исчерпаны`,
      );
      return { status: 'exhausted', ...figures };
    }

    // Все списания и зачисление применяются одной заменой
    balances.set(symbol, before + transferred);
    this.commit(balances);

    this.logger.log(`Доля ${symbol} увеличена с $${before.toFixed(2)} до $${figures.after.toFixed(2)}`);

    return remaining > EPSILON ? { status: 'partial', ...figures } : { status: 'boosted', ...figures };
  }

  getBestPair(): string | undefined {
    return findBestPair(Array.from(this.instruments.values()))?.symbol;
  }

  /**
   * Рейтинг пар по композитной оценке, лучшие первыми
   */
  getPairRankings(): PairRanking[] {
    return Array.from(this.instruments.values())
      .map((item) => ({
        symbol: item.symbol,
        score: compositeScore(item.stats),
        winRate: winRateOf(item.stats) * 100,
        totalTrades: item.stats.totalTrades,
        wins: item.stats.wins,
        losses: item.stats.losses,
        allocatedBalance: item.allocatedBalance,
      }))
      .sort((a, b) => b.score - a.score);
  }

  private findTopHolder(): string | undefined {
    let top: InstrumentAllocation | undefined;
    this.instruments.forEach((item) => {
      if (!top || item.allocatedBalance > top.allocatedBalance) {
        top = item;
      }
    });
    return top?.symbol;
  }

  private commit(balances: Map<string, number>) {
    const available = this.getAvailableBalance();
    let total = 0;
    balances.forEach((value) => (total += value));

    const scale = total > available + EPSILON && total > 0 ? available / total : 1;
    if (scale < 1) {
      this.logger.warn(
        `Доли $${total.toFixed(2)} превышают доступные $${available.toFixed(2)}, пропорционально уменьшены`,
      );
    }

    const next = new Map<string, InstrumentAllocation>();
    this.instruments.forEach((item, symbol) => {
      next.set(symbol, { ...item, allocatedBalance: (balances.get(symbol) ?? item.allocatedBalance) * scale });
    });
    this.instruments = next;
  }

  private createInstrument(symbol: string): InstrumentAllocation {
    return { symbol, allocatedBalance: 0, stats: emptyStats(), hasOpenPosition: false };
  }
}
