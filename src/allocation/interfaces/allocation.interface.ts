export interface TradeStats {
  wins: number;
  losses: number;
  totalTrades: number;
  consecutiveLosses: number;
  // последние исходы, старые -> новые (true = прибыльная сделка)
  recentOutcomes: boolean[];
}

export interface InstrumentAllocation {
  symbol: string;
  allocatedBalance: number;
  stats: TradeStats;
  hasOpenPosition: boolean;
}

export type AllocationStrategy =
  | { kind: 'equal' }
  | { kind: 'weighted' }
  | { kind: 'dynamic'; recencyWindow: number }
  | { kind: 'best'; bestShare: number };

export type AllocationStrategyKind = AllocationStrategy['kind'];

export interface DonorTransfer {
  donor: string;
  amount: number;
}

interface BoostFigures {
  symbol: string;
  before: number;
  after: number;
  needed: number;
  transferred: number;
  transfers: DonorTransfer[];
}

export type BoostOutcome =
  | { status: 'not-needed'; symbol: string; before: number; reason: string }
  | ({ status: 'boosted' } & BoostFigures)
  | ({ status: 'partial' } & BoostFigures)
  | ({ status: 'exhausted' } & BoostFigures);
