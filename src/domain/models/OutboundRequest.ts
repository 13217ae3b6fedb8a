import type { OrderRequest } from '@/domain/models/Order';
import type { Market, MarketDataEntry } from '@/domain/types';

/**
 * ドメイン層: セッションから送信する要求
 *
 * コーデックがこれを検証してワイヤ形式へ変換する。
 */

export interface LoginRequest {
  type: 'login';
  token: string;
}

export interface MarketDataRequest {
  type: 'subscribe-market-data' | 'unsubscribe-market-data';
  tickers: readonly string[];
  entries: readonly MarketDataEntry[];
  market: Market;
  depth: number;
}

export interface OrderReportSubscribeRequest {
  type: 'subscribe-order-reports';
  account: string;
  snapshotOnlyActive: boolean;
}

export interface OrderReportUnsubscribeRequest {
  type: 'unsubscribe-order-reports';
  account: string;
}

export interface NewOrderRequest {
  type: 'new-order';
  order: OrderRequest;
}

export interface CancelOrderRequest {
  type: 'cancel-order';
  clientOrderId: string;
  proprietary: string;
}

export type OutboundRequest =
  | LoginRequest
  | MarketDataRequest
  | OrderReportSubscribeRequest
  | OrderReportUnsubscribeRequest
  | NewOrderRequest
  | CancelOrderRequest;

export type OutboundRequestType = OutboundRequest['type'];
