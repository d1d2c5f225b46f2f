import { Test, TestingModule } from '@nestjs/testing';
import { EngineConfigService } from '../config/engine-config.service';
import { ExecutionError } from '../common/errors/engine.errors';
import { createEngineConfig } from '../testing/engine-config.fixture';
import { MarketDataService } from './market-data.service';
import { PaperExecutionService } from './paper-execution.service';

describe('PaperExecutionService', () => {
  let service: PaperExecutionService;
  let marketDataService: MarketDataService;

  const priceAt = (price: number) =>
    marketDataService.buildSnapshot('BTCUSDT', [{ openTime: 1620000000000, close: price, volume: 10 }]);

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PaperExecutionService,
        MarketDataService,
        { provide: EngineConfigService, useValue: createEngineConfig() },
      ],
    }).compile();

    service = module.get<PaperExecutionService>(PaperExecutionService);
    marketDataService = module.get<MarketDataService>(MarketDataService);
  });

  it('should start from the initial balance', async () => {
    await expect(service.getTotalBalance()).resolves.toBe(1000);
  });

  it('should fill at the last price and realize P&L on close', async () => {
    priceAt(100);
    await expect(service.placeOrder('BTCUSDT', 'long', 2, 10)).resolves.toBe('paper-1');
    expect(service.getOpenLegs('BTCUSDT')).toEqual([{ side: 'long', entryPrice: 100, size: 2, leverage: 10 }]);

    priceAt(110);
    await service.closePosition('BTCUSDT');

    await expect(service.getTotalBalance()).resolves.toBe(1020);
    expect(service.getOpenLegs('BTCUSDT')).toEqual([]);
  });

  it('should settle a hedged position as one result', async () => {
    priceAt(100);
    await service.placeOrder('BTCUSDT', 'long', 10, 10);
    priceAt(98);
    await service.placeOrder('BTCUSDT', 'short', 5, 5);

    priceAt(96);
    await service.closePosition('BTCUSDT');

    await expect(service.getTotalBalance()).resolves.toBe(970);
  });

  it('should refuse to fill without a price', async () => {
    await expect(service.placeOrder('ETHUSDT', 'long', 1, 10)).rejects.toBeInstanceOf(ExecutionError);
  });

  it('should ignore closing a symbol without legs', async () => {
    await service.closePosition('BTCUSDT');
    await expect(service.getTotalBalance()).resolves.toBe(1000);
  });
});
