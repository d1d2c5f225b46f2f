import { Test, TestingModule } from '@nestjs/testing';
import { EngineConfigService } from '../config/engine-config.service';
import { createEngineConfig } from '../testing/engine-config.fixture';
import { AllocationLedgerService } from './allocation-ledger.service';

describe('AllocationLedgerService', () => {
  const createLedger = async (overrides: Record<string, string> = {}) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AllocationLedgerService,
        { provide: EngineConfigService, useValue: createEngineConfig(overrides) },
      ],
    }).compile();
    return module.get<AllocationLedgerService>(AllocationLedgerService);
  };

  it('should register the configured pairs with zero balance', async () => {
    const ledger = await createLedger();

    expect(ledger.symbols()).toEqual(['BTCUSDT', 'ETHUSDT', 'XRPUSDT']);
    expect(ledger.getTotalAllocated()).toBe(0);
  });

  it('should split the balance after the reserve', async () => {
    const ledger = await createLedger();
    ledger.updateAccountBalance(1000);

    expect(ledger.getReservedBalance()).toBeCloseTo(200);
    expect(ledger.getAvailableBalance()).toBeCloseTo(800);
    for (const symbol of ledger.symbols()) {
      expect(ledger.getAllocation(symbol)).toBeCloseTo(266.67, 2);
    }
  });

  it('should scale manual allocations down to the available balance', async () => {
    const ledger = await createLedger();
    ledger.updateAccountBalance(1000);
    ledger.assign({ BTCUSDT: 500, ETHUSDT: 500 });

    expect(ledger.getAllocation('BTCUSDT')).toBeCloseTo(400);
    expect(ledger.getAllocation('ETHUSDT')).toBeCloseTo(400);
    expect(ledger.getAllocation('XRPUSDT')).toBe(0);
    expect(ledger.getTotalAllocated()).toBeLessThanOrEqual(ledger.getAvailableBalance() + 1e-9);
  });

  describe('boostAllocationForSignal', () => {
    const pairs = { TRADING_PAIRS: 'AUSDT,BUSDT,TUSDT' };

    it('should take the shortfall from the largest idle donor', async () => {
      const ledger = await createLedger({ ...pairs, MIN_POSITION_VALUE: '25' });
      ledger.updateAccountBalance(125);
      ledger.assign({ AUSDT: 80, BUSDT: 20, TUSDT: 0 });
      ledger.setOpenPosition('BUSDT', true);

      const outcome = ledger.boostAllocationForSignal('TUSDT', { strength: 65 });

      expect(outcome).toEqual({
        status: 'boosted',
        symbol: 'TUSDT',
        before: 0,
        after: 25,
        needed: 25,
        transferred: 25,
        transfers: [{ donor: 'AUSDT', amount: 25 }],
      });
      expect(ledger.getAllocation('AUSDT')).toBe(55);
      expect(ledger.getAllocation('BUSDT')).toBe(20);
      expect(ledger.getAllocation('TUSDT')).toBe(25);
      expect(ledger.getTotalAllocated()).toBe(100);
    });

    it('should prefer idle donors over active ones', async () => {
      const ledger = await createLedger(pairs);
      ledger.updateAccountBalance(125);
      ledger.assign({ AUSDT: 60, BUSDT: 40, TUSDT: 0 });
      ledger.setOpenPosition('AUSDT', true);

      const outcome = ledger.boostAllocationForSignal('TUSDT', { strength: 75 });

      expect(outcome.status).toBe('boosted');
      expect(ledger.getAllocation('AUSDT')).toBe(60);
      expect(ledger.getAllocation('BUSDT')).toBeCloseTo(25);
      expect(ledger.getAllocation('TUSDT')).toBeCloseTo(15);
      expect(ledger.getTotalAllocated()).toBeCloseTo(100);
    });

    it('should stop at the donor floor and report a partial boost', async () => {
      const ledger = await createLedger({ ...pairs, MIN_POSITION_VALUE: '25' });
      ledger.updateAccountBalance(125);
      ledger.assign({ AUSDT: 40, BUSDT: 0, TUSDT: 0 });

      const outcome = ledger.boostAllocationForSignal('TUSDT', { strength: 65 });

      expect(outcome.status).toBe('partial');
      expect(ledger.getAllocation('AUSDT')).toBe(25);
      expect(ledger.getAllocation('TUSDT')).toBe(15);
    });

    it('should keep 20% of the pool with the top holder', async () => {
      const ledger = await createLedger({ TRADING_PAIRS: 'AUSDT,BUSDT,CUSDT,TUSDT', MIN_POSITION_VALUE: '1' });
      ledger.updateAccountBalance(125);
      ledger.assign({ AUSDT: 34, BUSDT: 33, CUSDT: 33, TUSDT: 0 });

      const outcome = ledger.boostAllocationForSignal('TUSDT', { strength: 75 });

      expect(outcome.status).toBe('boosted');
      if (outcome.status !== 'boosted') return;
      expect(outcome.transfers[0]).toEqual({ donor: 'AUSDT', amount: 14 });
      expect(outcome.transfers[1].donor).toBe('BUSDT');
      expect(outcome.transfers[1].amount).toBeCloseTo(1);
      expect(ledger.getAllocation('AUSDT')).toBe(20);
      expect(ledger.getAllocation('BUSDT')).toBeCloseTo(32);
      expect(ledger.getAllocation('CUSDT')).toBe(33);
      expect(ledger.getAllocation('TUSDT')).toBeCloseTo(15);
    });

    it('should leave balances untouched when every donor is at its floor', async () => {
      const ledger = await createLedger({ ...pairs, MIN_POSITION_VALUE: '25' });
      ledger.updateAccountBalance(125);
      ledger.assign({ AUSDT: 25, BUSDT: 25, TUSDT: 0 });

      const outcome = ledger.boostAllocationForSignal('TUSDT', { strength: 90 });

      expect(outcome).toMatchObject({ status: 'exhausted', transferred: 0, transfers: [] });
      expect(ledger.getAllocation('AUSDT')).toBe(25);
      expect(ledger.getAllocation('BUSDT')).toBe(25);
      expect(ledger.getAllocation('TUSDT')).toBe(0);
    });

    it('should ignore signals below the threshold', async () => {
      const ledger = await createLedger(pairs);
      ledger.updateAccountBalance(125);

      const outcome = ledger.boostAllocationForSignal('TUSDT', { strength: 50 });

      expect(outcome.status).toBe('not-needed');
    });
  });

  it('should record trade results and reset the loss streak on a win', async () => {
    const ledger = await createLedger();

    ledger.recordTradeResult('BTCUSDT', -5, false);
    ledger.recordTradeResult('BTCUSDT', -3, false);
    expect(ledger.getStatistics('BTCUSDT')).toMatchObject({ losses: 2, consecutiveLosses: 2 });

    ledger.recordTradeResult('BTCUSDT', 8, true);
    expect(ledger.getStatistics('BTCUSDT')).toEqual({
      wins: 1,
      losses: 2,
      totalTrades: 3,
      consecutiveLosses: 0,
      recentOutcomes: [false, false, true],
    });
  });

  it('should use the fallback win rate without history', async () => {
    const ledger = await createLedger();
    expect(ledger.getWinRatePercent('BTCUSDT')).toBe(50);

    ledger.recordTradeResult('BTCUSDT', 1, true);
    ledger.recordTradeResult('BTCUSDT', -1, false);
    expect(ledger.getWinRatePercent('BTCUSDT')).toBe(50);

    ledger.recordTradeResult('BTCUSDT', 1, true);
    expect(ledger.getWinRatePercent('BTCUSDT')).toBeCloseTo(66.67, 2);
  });

  it('should rank pairs by score', async () => {
    const ledger = await createLedger();
    ledger.recordTradeResult('ETHUSDT', 3, true);
    ledger.recordTradeResult('XRPUSDT', -1, false);

    const rankings = ledger.getPairRankings();

    expect(rankings.map((ranking) => ranking.symbol)).toEqual(['ETHUSDT', 'XRPUSDT', 'BTCUSDT']);
    expect(rankings[0]).toMatchObject({ winRate: 100, totalTrades: 1, wins: 1, losses: 0 });
    expect(ledger.getBestPair()).toBe('ETHUSDT');
  });

  it('should add and remove pairs and reallocate', async () => {
    const ledger = await createLedger();
    ledger.updateAccountBalance(1000);

    expect(ledger.addInstrument('solusdt')).toBe(true);
    expect(ledger.addInstrument('SOLUSDT')).toBe(false);
    expect(ledger.getAllocation('SOLUSDT')).toBeCloseTo(200);

    ledger.setOpenPosition('SOLUSDT', true);
    expect(ledger.removeInstrument('SOLUSDT')).toBe(false);

    ledger.setOpenPosition('SOLUSDT', false);
    expect(ledger.removeInstrument('SOLUSDT')).toBe(true);
    expect(ledger.has('SOLUSDT')).toBe(false);
    expect(ledger.getAllocation('BTCUSDT')).toBeCloseTo(266.67, 2);
  });
});
