import { EngineErrorKind, InvalidConfigurationError } from '../common/errors/engine.errors';
import { createEngineConfig } from '../testing/engine-config.fixture';

describe('EngineConfigService', () => {
  it('should load the settings', () => {
    const config = createEngineConfig();

    expect(config.settings).toMatchObject({
      tradingPairs: ['BTCUSDT', 'ETHUSDT', 'XRPUSDT'],
      reserveFraction: 0.2,
      minLeverage: 5,
      maxLeverage: 20,
      allocationStrategy: { kind: 'equal' },
      paperTrading: true,
    });
  });

  it('should normalize and deduplicate pairs', () => {
    const config = createEngineConfig({ TRADING_PAIRS: ' btcusdt, ETHUSDT,,btcusdt ' });

    expect(config.settings.tradingPairs).toEqual(['BTCUSDT', 'ETHUSDT']);
  });

  it('should map the allocation strategy names', () => {
    expect(createEngineConfig({ ALLOCATION_STRATEGY: 'BEST' }).settings.allocationStrategy).toEqual({
      kind: 'best',
      bestShare: 0.8,
    });
    expect(createEngineConfig({ ALLOCATION_STRATEGY: 'dynamic' }).settings.allocationStrategy).toEqual({
      kind: 'dynamic',
      recencyWindow: 10,
    });
  });

  it.each([
    ['inverted leverage bounds', { MIN_LEVERAGE: '25' }],
    ['a reserve of the whole balance', { RESERVE_FRACTION: '1' }],
    ['an unknown strategy', { ALLOCATION_STRATEGY: 'martingale' }],
    ['a non-numeric value', { STOP_LOSS_PERCENT: 'three' }],
    ['a fractional leverage', { LEVERAGE: '2.5' }],
    ['live mode without keys', { PAPER_TRADING: 'false' }],
    ['a zero exchange timeout', { EXCHANGE_TIMEOUT_MS: '0' }],
    ['a negative retry count', { EXCHANGE_MAX_RETRIES: '-1' }],
  ])('should reject %s', (_, overrides) => {
    expect(() => createEngineConfig(overrides)).toThrow(InvalidConfigurationError);
  });

  it('should collect every problem in one error', () => {
    const error = (() => {
      try {
        createEngineConfig({ MIN_LEVERAGE: '25', RESERVE_FRACTION: '-0.1' });
        return undefined;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(InvalidConfigurationError);
    expect(error).toMatchObject({ kind: EngineErrorKind.INVALID_CONFIGURATION, recoverable: false });
    if (error instanceof InvalidConfigurationError) {
      expect(error.problems).toEqual([
        'RESERVE_FRACTION должен быть в [0, 1), получено -0.1',
        'MIN_LEVERAGE (25) больше MAX_LEVERAGE (20)',
      ]);
    }
  });

  it('should accept live mode with keys', () => {
    const config = createEngineConfig({
      PAPER_TRADING: 'false',
      BYBIT_API_KEY: 'test-key',
      BYBIT_API_SECRET: 'test-secret',
    });

    expect(config.settings.paperTrading).toBe(false);
    expect(config.settings.exchange).toMatchObject({ apiKey: 'test-key', apiSecret: 'test-secret', testnet: false });
  });
});
