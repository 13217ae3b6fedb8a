/**
 * ドメイン層: 取引所 API の列挙値
 *
 * 値はワイヤ上の表記そのもの。キーはアプリケーション側で使う名前。
 */

export const Environment = {
  REMARKET: 'REMARKET',
  LIVE: 'LIVE',
} as const;
export type Environment = (typeof Environment)[keyof typeof Environment];

export const Market = {
  ROFEX: 'ROFX',
} as const;
export type Market = (typeof Market)[keyof typeof Market];

export const Side = {
  BUY: 'buy',
  SELL: 'sell',
} as const;
export type Side = (typeof Side)[keyof typeof Side];

export const OrderType = {
  LIMIT: 'limit',
  MARKET: 'market',
  MARKET_TO_LIMIT: 'market_to_limit',
} as const;
export type OrderType = (typeof OrderType)[keyof typeof OrderType];

export const TimeInForce = {
  DAY: 'Day',
  IMMEDIATE_OR_CANCEL: 'IOC',
  FILL_OR_KILL: 'FOK',
  GOOD_TILL_DATE: 'GTD',
} as const;
export type TimeInForce = (typeof TimeInForce)[keyof typeof TimeInForce];

/**
 * マーケットデータのエントリ種別
 */
export const MarketDataEntry = {
  BIDS: 'BI',
  OFFERS: 'OF',
  LAST: 'LA',
  OPENING_PRICE: 'OP',
  CLOSING_PRICE: 'CL',
  SETTLEMENT_PRICE: 'SE',
  HIGH_PRICE: 'HI',
  LOW_PRICE: 'LO',
  TRADE_VOLUME: 'TV',
  OPEN_INTEREST: 'OI',
  INDEX_VALUE: 'IV',
  TRADE_EFFECTIVE_VOLUME: 'EV',
  NOMINAL_VOLUME: 'NV',
} as const;
export type MarketDataEntry = (typeof MarketDataEntry)[keyof typeof MarketDataEntry];
export type MarketDataEntryName = keyof typeof MarketDataEntry;

/** ワイヤ上のコード → エントリ名 */
export const MARKET_DATA_ENTRY_NAMES: Readonly<Record<MarketDataEntry, MarketDataEntryName>> = {
  BI: 'BIDS',
  OF: 'OFFERS',
  LA: 'LAST',
  OP: 'OPENING_PRICE',
  CL: 'CLOSING_PRICE',
  SE: 'SETTLEMENT_PRICE',
  HI: 'HIGH_PRICE',
  LO: 'LOW_PRICE',
  TV: 'TRADE_VOLUME',
  OI: 'OPEN_INTEREST',
  IV: 'INDEX_VALUE',
  EV: 'TRADE_EFFECTIVE_VOLUME',
  NV: 'NOMINAL_VOLUME',
};

/** エントリ未指定時に購読する全エントリ（定義順） */
export const ALL_MARKET_DATA_ENTRIES: readonly MarketDataEntry[] = Object.values(MarketDataEntry);

export function isMarketDataEntry(value: unknown): value is MarketDataEntry {
  return typeof value === 'string' && Object.hasOwn(MARKET_DATA_ENTRY_NAMES, value);
}

/**
 * 銘柄の識別子（シンボル + 市場）
 */
export interface InstrumentId {
  symbol: string;
  marketId: string;
}
