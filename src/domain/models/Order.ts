import type { Market, OrderType, Side, TimeInForce } from '@/domain/types';

/**
 * ドメイン層: 新規注文
 *
 * REST と WebSocket のどちらの経路でも同じ形で受け取る。
 */
export interface OrderRequest {
  ticker: string;
  market: Market;
  side: Side;
  size: number;
  orderType: OrderType;
  timeInForce: TimeInForce;
  account: string;
  /** 指値注文では必須 */
  price?: number;
  cancelPrevious: boolean;
  iceberg: boolean;
  /** GTD 注文の有効期限（yyyyMMdd） */
  expireDate?: string;
  /** アイスバーグ注文の表示数量 */
  displayQuantity?: number;
  /** WebSocket 経由の注文でクライアントが付与する ID */
  clientOrderId?: string;
}
