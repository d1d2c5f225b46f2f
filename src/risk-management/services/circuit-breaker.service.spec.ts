import { Test, TestingModule } from '@nestjs/testing';
import { EngineConfigService } from '../../config/engine-config.service';
import { createEngineConfig } from '../../testing/engine-config.fixture';
import { CircuitBreakerService } from './circuit-breaker.service';

describe('CircuitBreakerService', () => {
  let service: CircuitBreakerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CircuitBreakerService,
        { provide: EngineConfigService, useValue: createEngineConfig() },
      ],
    }).compile();

    service = module.get<CircuitBreakerService>(CircuitBreakerService);
  });

  it('should stay closed below five losses', () => {
    expect(service.evaluate('BTCUSDT', 4, 1)).toBe('closed');
    expect(service.isOpen('BTCUSDT')).toBe(false);
  });

  it('should trip at five losses and stay open during the cooldown', () => {
    expect(service.evaluate('BTCUSDT', 5, 1)).toBe('open');
    expect(service.evaluate('BTCUSDT', 5, 60)).toBe('open');
    expect(service.isOpen('BTCUSDT')).toBe(true);
    expect(service.getTripped()).toEqual([{ symbol: 'BTCUSDT', trippedAtCycle: 1, consecutiveLosses: 5 }]);
  });

  it('should expire after the cooldown cycles', () => {
    service.evaluate('BTCUSDT', 5, 1);

    expect(service.evaluate('BTCUSDT', 5, 61)).toBe('expired');
    expect(service.isOpen('BTCUSDT')).toBe(false);
  });

  it('should reset manually', () => {
    service.evaluate('ETHUSDT', 6, 3);

    expect(service.reset('ETHUSDT')).toBe(true);
    expect(service.reset('ETHUSDT')).toBe(false);
    expect(service.isOpen('ETHUSDT')).toBe(false);
  });

  it('should track instruments independently', () => {
    service.evaluate('BTCUSDT', 5, 1);

    expect(service.evaluate('ETHUSDT', 0, 1)).toBe('closed');
    expect(service.isOpen('BTCUSDT')).toBe(true);
  });
});
