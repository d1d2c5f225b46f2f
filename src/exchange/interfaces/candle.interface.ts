export interface Candle {
  openTime: number;
  close: number;
  volume: number;
}
