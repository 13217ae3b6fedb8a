import type { z } from 'zod';
import type { FrameData, MessageCodec } from '@/application/interfaces/MessageCodec';
import { ProtocolError, ValidationError } from '@/domain/errors';
import {
  type DecodedFrame,
  ErrorCode,
  type ErrorMessage,
  type MarketDataEntries,
} from '@/domain/models/InboundMessage';
import type { OutboundRequest } from '@/domain/models/OutboundRequest';
import { isMarketDataEntry, MARKET_DATA_ENTRY_NAMES } from '@/domain/types';
import {
  CancelOrderRequestSchema,
  ErrorBodySchema,
  formatZodIssues,
  LoginRequestSchema,
  LoginResponseSchema,
  MarketDataFrameSchema,
  MarketDataRequestSchema,
  OrderReportFrameSchema,
  OrderReportSubscribeRequestSchema,
  OrderReportUnsubscribeRequestSchema,
  OrderRequestSchema,
} from './schemas';

/**
 * インフラ層: Primary API の WebSocket メッセージコーデック
 *
 * 責務:
 * - 送信要求を検証し、JSON テキストフレームへ変換する
 * - 受信フレームを分類し、型付きメッセージへ変換する
 *
 * 分類の優先順位: type=login → status=ERROR → type=Md / or（大文字小文字を区別しない）。
 * 復号は例外を投げず、解釈できないフレームは error カテゴリのメッセージとして返す。
 */
export class PrimaryMessageCodec implements MessageCodec {
  encode(request: OutboundRequest): string {
    switch (request.type) {
      case 'login': {
        const { token } = validate(request.type, LoginRequestSchema, request);
        return JSON.stringify({ type: 'login', token });
      }
      case 'subscribe-market-data':
      case 'unsubscribe-market-data': {
        const { tickers, entries, market, depth } = validate(request.type, MarketDataRequestSchema, request);
        return JSON.stringify({
          type: request.type === 'subscribe-market-data' ? 'smd' : 'umd',
          level: 1,
          entries,
          products: tickers.map((symbol) => ({ symbol, marketId: market })),
          depth,
        });
      }
      case 'subscribe-order-reports': {
        const { account, snapshotOnlyActive } = validate(request.type, OrderReportSubscribeRequestSchema, request);
        return JSON.stringify({ type: 'os', account: { id: account }, snapshotOnlyActive });
      }
      case 'unsubscribe-order-reports': {
        const { account } = validate(request.type, OrderReportUnsubscribeRequestSchema, request);
        return JSON.stringify({ type: 'uos', account: { id: account } });
      }
      case 'new-order': {
        const order = validate(request.type, OrderRequestSchema, request.order);
        return JSON.stringify({
          type: 'no',
          product: { symbol: order.ticker, marketId: order.market },
          price: order.price,
          quantity: order.size,
          side: order.side,
          account: order.account,
          timeInForce: order.timeInForce,
          cancelPrevious: order.cancelPrevious,
          iceberg: order.iceberg,
          expireDate: order.expireDate,
          displayQuantity: order.displayQuantity,
          wsClOrdId: order.clientOrderId,
        });
      }
      case 'cancel-order': {
        const { clientOrderId, proprietary } = validate(request.type, CancelOrderRequestSchema, request);
        return JSON.stringify({ type: 'co', clientId: clientOrderId, proprietary });
      }
      default:
        throw new ValidationError('unknown request type');
    }
  }

  decode(data: FrameData): DecodedFrame {
    const raw = toText(data);

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      return protocolError(ErrorCode.MALFORMED_FRAME, 'frame is not valid JSON', raw, error);
    }

    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      return protocolError(ErrorCode.UNSUPPORTED_MESSAGE, 'frame is not a JSON object', raw);
    }

    const type = 'type' in payload && typeof payload.type === 'string' ? payload.type : null;
    const status = 'status' in payload ? payload.status : undefined;

    if (type?.toUpperCase() === 'LOGIN') {
      return this.decodeLogin(payload, raw);
    }
    if (status === 'ERROR') {
      return this.decodeServerError(payload, raw);
    }

    switch (type?.toUpperCase()) {
      case 'MD':
        return this.decodeMarketData(payload, raw);
      case 'OR':
        return this.decodeOrderReport(payload, raw);
      case undefined:
        return protocolError(ErrorCode.UNSUPPORTED_MESSAGE, 'message has no type field', raw);
      default:
        return protocolError(ErrorCode.UNSUPPORTED_MESSAGE, `unsupported message type: ${type}`, raw);
    }
  }

  private decodeLogin(payload: object, raw: string): DecodedFrame {
    const parsed = LoginResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return protocolError(ErrorCode.INVALID_PAYLOAD, 'invalid login response', raw, parsed.error);
    }
    return {
      category: 'login',
      accepted: parsed.data.status === 'OK',
      description: parsed.data.description ?? null,
      raw,
    };
  }

  private decodeServerError(payload: object, raw: string): ErrorMessage {
    const parsed = ErrorBodySchema.safeParse(payload);
    const body = parsed.success ? parsed.data : undefined;
    return {
      category: 'error',
      code: body?.code !== undefined ? String(body.code) : ErrorCode.SERVER_ERROR,
      description: body?.description ?? body?.message ?? 'unknown error',
      raw,
    };
  }

  private decodeMarketData(payload: object, raw: string): DecodedFrame {
    const parsed = MarketDataFrameSchema.safeParse(payload);
    if (!parsed.success) {
      return protocolError(
        ErrorCode.INVALID_PAYLOAD,
        `invalid market data payload: ${formatZodIssues(parsed.error).join('; ')}`,
        raw,
        parsed.error
      );
    }

    // 未知のエントリコードは読み飛ばす
    const entries: MarketDataEntries = {};
    for (const [code, value] of Object.entries(parsed.data.marketData)) {
      if (isMarketDataEntry(code)) {
        entries[MARKET_DATA_ENTRY_NAMES[code]] = value;
      }
    }

    return {
      category: 'market-data',
      instrument: parsed.data.instrumentId,
      timestamp: parsed.data.timestamp ?? null,
      entries,
      raw,
    };
  }

  private decodeOrderReport(payload: object, raw: string): DecodedFrame {
    const parsed = OrderReportFrameSchema.safeParse(payload);
    if (!parsed.success) {
      return protocolError(
        ErrorCode.INVALID_PAYLOAD,
        `invalid order report payload: ${formatZodIssues(parsed.error).join('; ')}`,
        raw,
        parsed.error
      );
    }
    return { category: 'order-report', report: parsed.data.orderReport, raw };
  }
}

function validate<T>(requestType: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ValidationError(`invalid ${requestType} request: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

function protocolError(code: string, description: string, raw: string, cause?: unknown): ErrorMessage {
  return {
    category: 'error',
    code,
    description,
    raw,
    protocolError: new ProtocolError(description, raw, cause === undefined ? undefined : { cause }),
  };
}

function toText(data: FrameData): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
