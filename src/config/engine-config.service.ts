import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InvalidConfigurationError } from '../common/errors/engine.errors';
import { AllocationStrategy } from '../allocation/interfaces/allocation.interface';

export interface ExchangeSettings {
  apiKey: string;
  apiSecret: string;
  testnet: boolean;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface EngineSettings {
  tradingPairs: string[];
  reserveFraction: number;
  basePositionSizePercent: number;
  minPositionSizePercent: number;
  maxPositionSizePercent: number;
  baseLeverage: number;
  minLeverage: number;
  maxLeverage: number;
  dynamicLeverage: boolean;
  minPositionValue: number;
  stopLossPercent: number;
  takeProfitPercent: number;
  trailingStopPercent: number;
  hedgeTriggerPercent: number;
  signalStrengthThreshold: number;
  allocationStrategy: AllocationStrategy;
  circuitBreakerCooldownCycles: number;
  paperTrading: boolean;
  initialBalance: number;
  exchange: ExchangeSettings;
}

const RECENCY_WINDOW = 10;
const BEST_PAIR_SHARE = 0.8;

/**
 * Читает и проверяет настройки движка один раз при старте.
 * Некорректная конфигурация прерывает bootstrap до первого цикла.
 */
@Injectable()
export class EngineConfigService {
  private readonly logger = new Logger(EngineConfigService.name);
  private readonly problems: string[] = [];
  readonly settings: Readonly<EngineSettings>;

  constructor(private configService: ConfigService) {
    const settings: EngineSettings = {
      tradingPairs: this.readList('TRADING_PAIRS', 'BTCUSDT'),
      reserveFraction: this.readNumber('RESERVE_FRACTION', 0.2),
      basePositionSizePercent: this.readNumber('BASE_POSITION_SIZE_PERCENT', 15),
      minPositionSizePercent: this.readNumber('MIN_POSITION_SIZE_PERCENT', 5),
      maxPositionSizePercent: this.readNumber('MAX_POSITION_SIZE_PERCENT', 40),
      baseLeverage: this.readInteger('LEVERAGE', 11),
      minLeverage: this.readInteger('MIN_LEVERAGE', 5),
      maxLeverage: this.readInteger('MAX_LEVERAGE', 20),
      dynamicLeverage: this.readBoolean('ENABLE_DYNAMIC_LEVERAGE', true),
      minPositionValue: this.readNumber('MIN_POSITION_VALUE', 5),
      stopLossPercent: this.readNumber('STOP_LOSS_PERCENT', 3),
      takeProfitPercent: this.readNumber('TAKE_PROFIT_PERCENT', 12),
      trailingStopPercent: this.readNumber('TRAILING_STOP_PERCENT', 2.5),
      hedgeTriggerPercent: this.readNumber('HEDGE_TRIGGER_PERCENT', 2),
      signalStrengthThreshold: this.readNumber('SIGNAL_STRENGTH_THRESHOLD', 60),
      allocationStrategy: this.readStrategy('ALLOCATION_STRATEGY', 'equal'),
      circuitBreakerCooldownCycles: this.readInteger('CIRCUIT_BREAKER_COOLDOWN_CYCLES', 60),
      paperTrading: this.readBoolean('PAPER_TRADING', true),
      initialBalance: this.readNumber('INITIAL_BALANCE', 100),
      exchange: {
        apiKey: this.configService.get<string>('BYBIT_API_KEY') || '',
        apiSecret: this.configService.get<string>('BYBIT_API_SECRET') || '',
        testnet: this.readBoolean('BYBIT_TESTNET', false),
        timeoutMs: this.readInteger('EXCHANGE_TIMEOUT_MS', 10000),
        maxRetries: this.readInteger('EXCHANGE_MAX_RETRIES', 3),
        retryDelayMs: this.readInteger('EXCHANGE_RETRY_DELAY_MS', 500),
      },
    };

    this.validate(settings);

    if (this.problems.length > 0) {
      this.logger.error(`Конфигурация отклонена: ${this.problems.join('; ')}`);
      throw new InvalidConfigurationError(this.problems);
    }

    this.settings = Object.freeze(settings);
    this.logger.log(
      `Настройки движка загружены: пары=${settings.tradingPairs.join(',')}, ` +
      `резерв=${(settings.reserveFraction * 100).toFixed(0)}%, ` +
      `плечо=${settings.minLeverage}-${settings.maxLeverage}x, ` +
      `стратегия=${settings.allocationStrategy.kind}, ` +
      `режим=${settings.paperTrading ? 'PAPER' : 'LIVE'}`,
    );
  }

  private validate(s: EngineSettings) {
    if (s.tradingPairs.length === 0) {
      this.problems.push('TRADING_PAIRS пуст');
    }
    if (s.reserveFraction < 0 || s.reserveFraction >= 1) {
      this.problems.push(`RESERVE_FRACTION должен быть в [0, 1), получено ${s.reserveFraction}`);
    }
    if (s.minPositionSizePercent <= 0 || s.maxPositionSizePercent <= 0 || s.basePositionSizePercent <= 0) {
      this.problems.push('проценты размера позиции должны быть положительными');
    }
    if (s.minPositionSizePercent > s.maxPositionSizePercent) {
      this.problems.push(
        `MIN_POSITION_SIZE_PERCENT (${s.minPositionSizePercent}) больше MAX_POSITION_SIZE_PERCENT (${s.maxPositionSizePercent})`,
      );
    } else if (
      s.basePositionSizePercent < s.minPositionSizePercent ||
      s.basePositionSizePercent > s.maxPositionSizePercent
    ) {
      this.problems.push(`BASE_POSITION_SIZE_PERCENT (${s.basePositionSizePercent}) вне диапазона min..max`);
    }
    if (s.maxPositionSizePercent > 100) {
      this.problems.push('MAX_POSITION_SIZE_PERCENT не может превышать 100');
    }
    if (s.minLeverage < 1) {
      this.problems.push(`MIN_LEVERAGE должен быть >= 1, получено ${s.minLeverage}`);
    }
    if (s.minLeverage > s.maxLeverage) {
      this.problems.push(`MIN_LEVERAGE (${s.minLeverage}) больше MAX_LEVERAGE (${s.maxLeverage})`);
    }
    if (s.baseLeverage < 1) {
      this.problems.push(`LEVERAGE должен быть >= 1, получено ${s.baseLeverage}`);
    }
    if (s.minPositionValue < 0) {
      this.problems.push('MIN_POSITION_VALUE не может быть отрицательным');
    }
    if (s.stopLossPercent <= 0 || s.takeProfitPercent <= 0 || s.trailingStopPercent <= 0) {
      this.problems.push('стоп-лосс, тейк-профит и трейлинг должны быть положительными');
    }
    if (s.stopLossPercent >= 100) {
      this.problems.push('STOP_LOSS_PERCENT должен быть меньше 100');
    }
    if (s.hedgeTriggerPercent <= 0) {
      this.problems.push('HEDGE_TRIGGER_PERCENT должен быть положительным');
    }
    if (s.signalStrengthThreshold < 0 || s.signalStrengthThreshold > 100) {
      this.problems.push('SIGNAL_STRENGTH_THRESHOLD должен быть в [0, 100]');
    }
    if (s.circuitBreakerCooldownCycles < 1) {
      this.problems.push('CIRCUIT_BREAKER_COOLDOWN_CYCLES должен быть >= 1');
    }
    if (s.initialBalance < 0) {
      this.problems.push('INITIAL_BALANCE не может быть отрицательным');
    }
    if (s.exchange.timeoutMs <= 0) {
      this.problems.push('EXCHANGE_TIMEOUT_MS должен быть положительным');
    }
    if (s.exchange.maxRetries < 0) {
      this.problems.push('EXCHANGE_MAX_RETRIES не может быть отрицательным');
    }
    if (!s.paperTrading && (!s.exchange.apiKey || !s.exchange.apiSecret)) {
      this.problems.push('для LIVE режима нужны BYBIT_API_KEY и BYBIT_API_SECRET');
    }
  }

  private readRaw(key: string): string | undefined {
    const value = this.configService.get<string | number | boolean>(key);
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    return String(value).trim();
  }

  private readNumber(key: string, fallback: number): number {
    const raw = this.readRaw(key);
    if (raw === undefined) return fallback;

    const value = parseFloat(raw);
    if (Number.isNaN(value)) {
      this.problems.push(`${key} не является числом: "${raw}"`);
      return fallback;
    }
    return value;
  }

  private readInteger(key: string, fallback: number): number {
    const value = this.readNumber(key, fallback);
    if (!Number.isInteger(value)) {
      this.problems.push(`${key} должен быть целым числом, получено ${value}`);
      return fallback;
    }
    return value;
  }

  private readBoolean(key: string, fallback: boolean): boolean {
    const raw = this.readRaw(key);
    if (raw === undefined) return fallback;

    const normalized = raw.toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;

    this.problems.push(`${key} должен быть true/false, получено "${raw}"`);
    return fallback;
  }

  private readList(key: string, fallback: string): string[] {
    const raw = this.readRaw(key) ?? fallback;
    return Array.from(
      new Set(
        raw
          .split(',')
          .map((item) => item.trim().toUpperCase())
          .filter((item) => item.length > 0),
      ),
    );
  }

  private readStrategy(key: string, fallback: string): AllocationStrategy {
    const name = (this.readRaw(key) ?? fallback).toLowerCase();

    switch (name) {
      case 'equal':
        return { kind: 'equal' };
      case 'weighted':
        return { kind: 'weighted' };
      case 'dynamic':
        return { kind: 'dynamic', recencyWindow: RECENCY_WINDOW };
      case 'best':
        return { kind: 'best', bestShare: BEST_PAIR_SHARE };
      default:
        this.problems.push(`неизвестная стратегия распределения "${name}"`);
        return { kind: 'equal' };
    }
  }
}
