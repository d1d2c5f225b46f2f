import { Body, Controller, Get, Post } from '@nestjs/common';
import { TradingEngineService } from './trading-engine.service';
import { TradingService } from './trading.service';

interface SymbolBody {
  symbol?: string;
}

@Controller('risk-management')
export class RiskManagementController {
  constructor(
    private tradingEngine: TradingEngineService,
    private tradingService: TradingService,
  ) {}

  /**
   * Рейтинг пар по результатам торговли
   */
  @Get('rankings')
  getRankings() {
    return {
      success: true,
      data: this.tradingEngine.getRankings(),
      timestamp: new Date().toISOString(),
    };
  }

  @Get('allocations')
  getAllocations() {
    return {
      success: true,
      data: this.tradingEngine.getAllocationReport(),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Сброс аварийной остановки по паре
   */
  @Post('reset-breaker')
  resetBreaker(@Body() body: SymbolBody) {
    const symbol = this.normalize(body);
    const success = symbol !== '' && this.tradingEngine.resetCircuitBreaker(symbol);

    return {
      success,
      message: success ? `Аварийная остановка по ${symbol} сброшена` : `Неизвестная пара: ${symbol}`,
      timestamp: new Date().toISOString(),
    };
  }

  @Post('instruments')
  addInstrument(@Body() body: SymbolBody) {
    const symbol = this.normalize(body);
    const success = symbol !== '' && this.tradingEngine.addInstrument(symbol);

    return {
      success,
      message: success ? `Пара ${symbol} добавлена` : `Пара ${symbol} не добавлена (пустая или уже есть)`,
      timestamp: new Date().toISOString(),
    };
  }

  @Post('instruments/remove')
  removeInstrument(@Body() body: SymbolBody) {
    const symbol = this.normalize(body);
    const success = symbol !== '' && this.tradingEngine.removeInstrument(symbol);

    return {
      success,
      message: success ? `Пара ${symbol} удалена` : `Пара ${symbol} не удалена (нет такой, открыта позиция или исполняется ордер)`,
      timestamp: new Date().toISOString(),
    };
  }

  @Post('start-trading')
  startTrading() {
    this.tradingService.startTrading();

    return {
      success: true,
      message: 'Торговля запущена',
      timestamp: new Date().toISOString(),
    };
  }

  @Post('stop-trading')
  stopTrading() {
    this.tradingService.stopTrading();

    return {
      success: true,
      message: 'Торговля остановлена',
      timestamp: new Date().toISOString(),
    };
  }

  private normalize(body: SymbolBody | undefined): string {
    return typeof body?.symbol === 'string' ? body.symbol.trim().toUpperCase() : '';
  }
}
