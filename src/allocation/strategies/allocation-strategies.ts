import { AllocationStrategy, InstrumentAllocation, TradeStats } from '../interfaces/allocation.interface';

export type Allocations = Map<string, number>;

const MIN_DYNAMIC_WEIGHT = 0.1;
const NEUTRAL_WEIGHT = 0.5;
const ACTIVITY_TRADES = 20;

export function hasHistory(stats: TradeStats): boolean {
  return stats.wins + stats.losses > 0;
}

/**
 * Доля прибыльных сделок 0..1; без истории — 0
 */
export function winRateOf(stats: TradeStats): number {
  const closed = stats.wins + stats.losses;
  return closed === 0 ? 0 : stats.wins / closed;
}

/**
 * Композитная оценка пары: 60% винрейт + 40% надежность статистики (до 20 сделок)
 */
export function compositeScore(stats: TradeStats): number {
  if (!hasHistory(stats)) return 0;
  const activity = Math.min(1, stats.totalTrades / ACTIVITY_TRADES);
  return winRateOf(stats) * 0.6 + activity * 0.4;
}

/**
 * Винрейт последних сделок с линейным весом: самая свежая весит больше всех
 */
export function recencyScore(outcomes: readonly boolean[], window: number): number {
  const recent = outcomes.slice(-window);
  if (recent.length === 0) return 0;

  let weighted = 0;
  let totalWeight = 0;
  recent.forEach((won, index) => {
    const weight = index + 1;
    totalWeight += weight;
    if (won) weighted += weight;
  });

  return weighted / totalWeight;
}

function equalSplit(available: number, instruments: readonly InstrumentAllocation[]): Allocations {
  const share = instruments.length > 0 ? available / instruments.length : 0;
  return new Map(instruments.map((item) => [item.symbol, share]));
}

function normalize(available: number, weights: Map<string, number>): Allocations {
  const total = Array.from(weights.values()).reduce((sum, weight) => sum + weight, 0);
  const result: Allocations = new Map();
  weights.forEach((weight, symbol) => result.set(symbol, total > 0 ? (available * weight) / total : 0));
  return result;
}

function allocateWeighted(available: number, instruments: readonly InstrumentAllocation[]): Allocations {
  const traded = instruments.filter((item) => hasHistory(item.stats));
  if (traded.length === 0) {
    return equalSplit(available, instruments);
  }

  const equalShare = available / instruments.length;
  const result: Allocations = new Map();
  instruments
    .filter((item) => !hasHistory(item.stats))
    .forEach((item) => result.set(item.symbol, equalShare));

  const pool = equalShare * traded.length;
  const totalRate = traded.reduce((sum, item) => sum + winRateOf(item.stats), 0);
  traded.forEach((item) => {
    const share = totalRate > 0 ? (pool * winRateOf(item.stats)) / totalRate : pool / traded.length;
    result.set(item.symbol, share);
  });

  return result;
}

function allocateDynamic(
  available: number,
  instruments: readonly InstrumentAllocation[],
  recencyWindow: number,
): Allocations {
  const weights = new Map<string, number>();
  instruments.forEach((item) => {
    const weight = hasHistory(item.stats)
      ? 0.5 * winRateOf(item.stats) + 0.5 * recencyScore(item.stats.recentOutcomes, recencyWindow)
      : NEUTRAL_WEIGHT;
    weights.set(item.symbol, Math.max(MIN_DYNAMIC_WEIGHT, weight));
  });
  return normalize(available, weights);
}

export function findBestPair(instruments: readonly InstrumentAllocation[]): InstrumentAllocation | undefined {
  let best: InstrumentAllocation | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const item of instruments) {
    if (!hasHistory(item.stats)) continue;
    const score = compositeScore(item.stats);
    if (score > bestScore) {
      bestScore = score;
      best = item;
    }
  }

  return best;
}

function allocateBest(
  available: number,
  instruments: readonly InstrumentAllocation[],
  bestShare: number,
): Allocations {
  const best = findBestPair(instruments);
  if (!best) {
    return equalSplit(available, instruments);
  }

  const others = instruments.filter((item) => item.symbol !== best.symbol);
  if (others.length === 0) {
    return new Map([[best.symbol, available]]);
  }

  const rest = (available * (1 - bestShare)) / others.length;
  const result: Allocations = new Map([[best.symbol, available * bestShare]]);
  others.forEach((item) => result.set(item.symbol, rest));
  return result;
}

/**
 * Делит доступный баланс между инструментами по выбранной стратегии
 */
export function allocate(
  strategy: AllocationStrategy,
  available: number,
  instruments: readonly InstrumentAllocation[],
): Allocations {
  if (instruments.length === 0 || available <= 0) {
    return new Map(instruments.map((item) => [item.symbol, 0]));
  }

  switch (strategy.kind) {
    case 'equal':
      return equalSplit(available, instruments);
    case 'weighted':
      return allocateWeighted(available, instruments);
    case 'dynamic':
      return allocateDynamic(available, instruments, strategy.recencyWindow);
    case 'best':
      return allocateBest(available, instruments, strategy.bestShare);
    default: {
      const unknown: never = strategy;
      throw new Error(`Неизвестная стратегия распределения: ${JSON.stringify(unknown)}`);
    }
  }
}
