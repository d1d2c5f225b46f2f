import { Test, TestingModule } from '@nestjs/testing';
import { EngineConfigService } from '../config/engine-config.service';
import { createEngineConfig } from '../testing/engine-config.fixture';
import { MarketSnapshot, Signal } from '../trading/interfaces/trading.interface';
import { LifecycleState } from './interfaces/position.interface';
import { PositionLifecycleService } from './position-lifecycle.service';

describe('PositionLifecycleService', () => {
  let service: PositionLifecycleService;

  const hold: Signal = { action: 'hold', strength: 0 };
  const at = (price: number): MarketSnapshot => ({ symbol: 'BTCUSDT', price, volatility: 0.02, volumeTrend: 0 });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PositionLifecycleService,
        { provide: EngineConfigService, useValue: createEngineConfig() },
      ],
    }).compile();

    service = module.get<PositionLifecycleService>(PositionLifecycleService);
  });

  describe('when flat', () => {
    it('should propose an entry on a strong signal', () => {
      expect(service.evaluate('BTCUSDT', at(100), { action: 'buy', strength: 80, reason: 'cross' })).toEqual({
        kind: 'open',
        side: 'long',
        reason: 'cross',
      });
      expect(service.evaluate('BTCUSDT', at(100), { action: 'sell', strength: 60 })).toMatchObject({
        kind: 'open',
        side: 'short',
      });
    });

    it('should hold on weak or neutral signals', () => {
      expect(service.evaluate('BTCUSDT', at(100), { action: 'buy', strength: 59 }).kind).toBe('hold');
      expect(service.evaluate('BTCUSDT', at(100), hold).kind).toBe('hold');
      expect(service.getState('BTCUSDT')).toBe(LifecycleState.FLAT);
    });
  });

  it('should set protective levels on entry', () => {
    const position = service.applyOpen('BTCUSDT', 'long', 100, 10, 10);

    expect(position.stopLoss).toBeCloseTo(97);
    expect(position.takeProfit).toBeCloseTo(112);
    expect(position.trailingExtreme).toBe(100);
    expect(service.getState('BTCUSDT')).toBe(LifecycleState.OPEN_LONG);
  });

  it('should mirror protective levels for a short', () => {
    const position = service.applyOpen('BTCUSDT', 'short', 100, 10, 10);

    expect(position.stopLoss).toBeCloseTo(103);
    expect(position.takeProfit).toBeCloseTo(88);
    expect(service.getState('BTCUSDT')).toBe(LifecycleState.OPEN_SHORT);
    expect(service.evaluate('BTCUSDT', at(103.5), hold)).toMatchObject({ kind: 'close', exitReason: 'stop-loss' });
  });

  it('should exit a long at the stop-loss', () => {
    service.applyOpen('BTCUSDT', 'long', 100, 10, 10);

    const intent = service.evaluate('BTCUSDT', at(96.9), hold);

    expect(intent).toMatchObject({ kind: 'close', exitReason: 'stop-loss' });
    if (intent.kind !== 'close') return;
    expect(intent.pnl).toBeCloseTo(-31);
  });

  it('should exit a long at the take-profit', () => {
    service.applyOpen('BTCUSDT', 'long', 100, 10, 10);
    expect(service.evaluate('BTCUSDT', at(112.5), hold)).toMatchObject({ kind: 'close', exitReason: 'take-profit' });
  });

  it('should trail the best price and exit on a retrace', () => {
    service.applyOpen('BTCUSDT', 'long', 100, 10, 10);

    expect(service.evaluate('BTCUSDT', at(105), hold).kind).toBe('hold');
    expect(service.getPosition('BTCUSDT')?.trailingExtreme).toBe(105);
    expect(service.evaluate('BTCUSDT', at(102), hold)).toMatchObject({ kind: 'close', exitReason: 'trailing-stop' });
  });

  it('should hedge half of a losing position once', () => {
    service.applyOpen('BTCUSDT', 'long', 100, 10, 10);

    expect(service.evaluate('BTCUSDT', at(97.8), hold)).toMatchObject({ kind: 'hedge', side: 'short', size: 5 });

    expect(service.applyHedge('BTCUSDT', 97.8, 5, 8)).toBe(true);
    expect(service.getState('BTCUSDT')).toBe(LifecycleState.HEDGED_LONG);
    expect(service.evaluate('BTCUSDT', at(97.8), hold).kind).toBe('hold');
    expect(service.applyHedge('BTCUSDT', 97.8, 5, 8)).toBe(false);
  });

  it('should not hedge a single contract', () => {
    service.applyOpen('BTCUSDT', 'long', 100, 1, 10);
    expect(service.evaluate('BTCUSDT', at(97.8), hold).kind).toBe('hold');
  });

  it('should close both legs with one combined result', () => {
    service.applyOpen('BTCUSDT', 'long', 100, 10, 10);
    service.applyHedge('BTCUSDT', 97.8, 5, 8);

    const closed = service.applyClose('BTCUSDT', 97);

    expect(closed?.pnl).toBeCloseTo(-26);
    expect(service.getState('BTCUSDT')).toBe(LifecycleState.FLAT);
    expect(service.applyClose('BTCUSDT', 97)).toBeUndefined();
  });

  it('should report the margin in use', () => {
    service.applyOpen('BTCUSDT', 'long', 100, 10, 10);
    service.applyHedge('BTCUSDT', 98, 5, 5);

    expect(service.getMarginInUse()).toBeCloseTo(198);
  });
});
