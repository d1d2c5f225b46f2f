export interface PairRanking {
  symbol: string;
  score: number;
  winRate: number; // %
  totalTrades: number;
  wins: number;
  losses: number;
  allocatedBalance: number;
}
