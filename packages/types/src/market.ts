export interface MarketTick {
  timestamp: Date;
  symbol: string;
  price: number;
}
