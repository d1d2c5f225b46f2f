import { Injectable, Logger } from '@nestjs/common';
import { KlineIntervalV3, RestClientV5 } from 'bybit-api';
import { EngineConfigService } from '../config/engine-config.service';
import { withRetry } from '../common/utils/with-retry';
import { BalanceSource, ExecutionPort, OrderSide } from '../trading/interfaces/trading.interface';
import { Candle } from './interfaces/candle.interface';

// Bybit: плечо уже установлено в нужное значение
const LEVERAGE_NOT_MODIFIED = 110043;
// Bybit: ордер с таким orderLinkId уже принят
const ORDER_LINK_ID_DUPLICATE = 110072;
// Длина orderLinkId у Bybit ограничена 36 символами
const ORDER_LINK_ID_MAX_LENGTH = 36;

/**
 * Bybit USDT-перпетуалы через REST v5.
 * Для хеджа аккаунт должен быть в режиме hedge (positionIdx 1 — long, 2 — short).
 */
@Injectable()
export class ExchangeService implements ExecutionPort, BalanceSource {
  private readonly logger = new Logger(ExchangeService.name);
  private restClient: RestClientV5;
  private orderCounter = 0;

  constructor(private engineConfig: EngineConfigService) {
    const { apiKey, apiSecret, testnet } = this.engineConfig.settings.exchange;

    this.restClient = new RestClientV5({
      key: apiKey || undefined,
      secret: apiSecret || undefined,
      testnet,
    });

    this.logger.log(`Bybit REST клиент создан (${testnet ? 'testnet' : 'mainnet'})`);
  }

  /**
   * Свечи от старых к новым
   */
  async getCandles(symbol: string, interval: string, limit: number = 100): Promise<Candle[]> {
    const list = await this.call(`getKline ${symbol}`, async () => {
      const response = await this.restClient.getKline({
        category: 'linear',
        symbol,
        interval: this.convertToKlineInterval(interval),
        limit,
      });
      if (response.retCode !== 0) {
        throw new Error(`Ошибка при получении свечей: ${response.retMsg}`);
      }
      return response.result.list;
    });

    // V5 API отдает свечи от новых к старым
    return list
      .map((candle) => ({
        openTime: parseInt(candle[0]),
        close: parseFloat(candle[4]),
        volume: parseFloat(candle[5]),
      }))
      .reverse();
  }

  async getTotalBalance(): Promise<number> {
    return this.call('getWalletBalance', async () => {
      const response = await this.restClient.getWalletBalance({
        accountType: 'CONTRACT',
        coin: 'USDT',
      });
      if (response.retCode !== 0) {
        throw new Error(`Ошибка при получении баланса: ${response.retMsg}`);
      }

      const account = response.result.list[0];
      const balance = account ? parseFloat(account.totalWalletBalance) : 0;
      return Number.isNaN(balance) ? 0 : balance;
    });
  }

  async placeOrder(symbol: string, side: OrderSide, size: number, leverage: number): Promise<string> {
    await this.call(`setLeverage ${symbol}`, async () => {
      const response = await this.restClient.setLeverage({
        category: 'linear',
        symbol,
        buyLeverage: String(leverage),
        sellLeverage: String(leverage),
      });
      if (response.retCode !== 0 && response.retCode !== LEVERAGE_NOT_MODIFIED) {
        throw new Error(`Ошибка установки плеча: ${response.retMsg}`);
      }
    });

    // Один orderLinkId на все попытки, биржа отклонит повтор
    const orderLinkId = this.nextOrderLinkId(symbol);
    const orderId = await this.call(`submitOrder ${symbol}`, async () => {
      const response = await this.restClient.submitOrder({
        category: 'linear',
        symbol,
        side: side === 'long' ? 'Buy' : 'Sell',
        orderType: 'Market',
        qty: String(size),
        positionIdx: side === 'long' ? 1 : 2,
        orderLinkId,
      });
      if (response.retCode === ORDER_LINK_ID_DUPLICATE) {
        this.logger.warn(`${symbol}: ордер ${orderLinkId} уже принят биржей в прошлой попытке`);
        return orderLinkId;
      }
      if (response.retCode !== 0) {
        throw new Error(`Ошибка при размещении ордера: ${response.retMsg}`);
      }
      return response.result.orderId;
    });

    this.logger.log(`Ордер размещен: ${symbol} ${side} ${size} (${leverage}x), id=${orderId}`);
    return orderId;
  }

  /**
   * Закрывает все ноги по символу reduce-only ордерами
   */
  async closePosition(symbol: string): Promise<void> {
    const positions = await this.call(`getPositionInfo ${symbol}`, async () => {
      const response = await this.restClient.getPositionInfo({ category: 'linear', symbol });
      if (response.retCode !== 0) {
        throw new Error(`Ошибка при получении позиций: ${response.retMsg}`);
      }
      return response.result.list.filter((position) => parseFloat(position.size) > 0);
    });

    for (const position of positions) {
      await this.call(`closePosition ${symbol}`, async () => {
        const response = await this.restClient.submitOrder({
          category: 'linear',
          symbol,
          side: position.side === 'Buy' ? 'Sell' : 'Buy',
          orderType: 'Market',
          qty: position.size,
          reduceOnly: true,
          positionIdx: position.positionIdx,
        });
        if (response.retCode !== 0) {
          throw new Error(`Ошибка при закрытии позиции: ${response.retMsg}`);
        }
      });
      this.logger.log(`Закрыта ${position.side} позиция ${symbol} размером ${position.size}`);
    }
  }

  private nextOrderLinkId(symbol: string): string {
    this.orderCounter += 1;
    return `${symbol}-${Date.now().toString(36)}-${this.orderCounter}`.slice(-ORDER_LINK_ID_MAX_LENGTH);
  }

  private call<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const { timeoutMs, maxRetries, retryDelayMs } = this.engineConfig.settings.exchange;
    return withRetry(operation, { label, timeoutMs, retries: maxRetries, delayMs: retryDelayMs });
  }

  private convertToKlineInterval(interval: string): KlineIntervalV3 {
    const map: { [key: string]: KlineIntervalV3 } = {
      '1m': '1',
      '3m': '3',
      '5m': '5',
      '15m': '15',
      '30m': '30',
      '1h': '60',
      '2h': '120',
      '4h': '240',
      '6h': '360',
      '12h': '720',
      '1d': 'D',
      '1w': 'W',
      '1M': 'M',
    };

    return map[interval] || '60';
  }
}
