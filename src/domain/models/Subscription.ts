import type { Market, MarketDataEntry } from '@/domain/types';

/**
 * ドメイン層: 購読
 *
 * 購読はセッションが生きている間保持され、再接続のたびに作成順で再送される。
 */

/** マーケットデータ購読の指定。省略項目は既定値で補う */
export interface MarketDataSubscriptionSpec {
  tickers: readonly string[];
  /** 省略時は全エントリ */
  entries?: readonly MarketDataEntry[];
  market?: Market;
  depth?: number;
}

/** 約定レポート購読の指定 */
export interface OrderReportSubscriptionSpec {
  account: string;
  /** true なら有効な注文のスナップショットのみ受け取る */
  snapshotOnlyActive?: boolean;
}

export interface MarketDataSubscription {
  id: string;
  kind: 'market-data';
  tickers: readonly string[];
  entries: readonly MarketDataEntry[];
  market: Market;
  depth: number;
}

export interface OrderReportSubscription {
  id: string;
  kind: 'order-report';
  account: string;
  snapshotOnlyActive: boolean;
}

export type Subscription = MarketDataSubscription | OrderReportSubscription;
