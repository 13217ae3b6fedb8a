import type { ProtocolError } from '@/domain/errors';
import type { InstrumentId, MarketDataEntryName } from '@/domain/types';

/**
 * ドメイン層: 受信メッセージ
 *
 * category をタグにした判別共用体。ハンドラは category ごとに登録される。
 */

export type MessageCategory = 'market-data' | 'order-report' | 'error';

/** 板の 1 段 / 直近値 */
export interface PriceLevel {
  price: number | null;
  size?: number | null;
  date?: number | null;
}

export type MarketDataValue = number | PriceLevel | PriceLevel[] | null;

export type MarketDataEntries = Partial<Record<MarketDataEntryName, MarketDataValue>>;

export interface MarketDataMessage {
  category: 'market-data';
  instrument: InstrumentId;
  timestamp: number | null;
  entries: MarketDataEntries;
  raw: string;
}

/**
 * 約定レポート（取引所の orderReport をそのままの名前で保持）
 */
export interface OrderReport {
  clOrdId: string;
  status: string;
  orderId?: string | null;
  proprietary?: string | null;
  execId?: string | null;
  accountId?: { id: string } | null;
  instrumentId?: InstrumentId | null;
  price?: number | null;
  orderQty?: number | null;
  ordType?: string | null;
  side?: string | null;
  timeInForce?: string | null;
  transactTime?: string | null;
  avgPx?: number | null;
  lastPx?: number | null;
  lastQty?: number | null;
  cumQty?: number | null;
  leavesQty?: number | null;
  text?: string | null;
}

export interface OrderReportMessage {
  category: 'order-report';
  report: OrderReport;
  raw: string;
}

export const ErrorCode = {
  /** サーバーが status=ERROR で返した通知 */
  SERVER_ERROR: 'SERVER_ERROR',
  /** JSON として解釈できないフレーム */
  MALFORMED_FRAME: 'MALFORMED_FRAME',
  /** 種別は分かったがスキーマに合わないフレーム */
  INVALID_PAYLOAD: 'INVALID_PAYLOAD',
  /** 未対応の種別 */
  UNSUPPORTED_MESSAGE: 'UNSUPPORTED_MESSAGE',
} as const;

export interface ErrorMessage {
  category: 'error';
  code: string;
  description: string;
  raw: string;
  /** クライアント側で復号に失敗した場合のみ設定される */
  protocolError?: ProtocolError;
}

export type InboundMessage = MarketDataMessage | OrderReportMessage | ErrorMessage;

export interface InboundMessageMap {
  'market-data': MarketDataMessage;
  'order-report': OrderReportMessage;
  error: ErrorMessage;
}

/**
 * ログインフレームへの応答。セッション内部でのみ消費され、ハンドラには配信されない。
 */
export interface LoginResponseMessage {
  category: 'login';
  accepted: boolean;
  description: string | null;
  raw: string;
}

export type DecodedFrame = InboundMessage | LoginResponseMessage;
