import { z } from 'zod';
import { Market, MarketDataEntry, OrderType, Side, TimeInForce } from '@/domain/types';

/**
 * インフラ層: ワイヤ形式の zod スキーマ
 *
 * 受信フレーム・REST 応答・送信要求の検証に使う。
 */

export const InstrumentIdSchema = z.object({
  symbol: z.string(),
  marketId: z.string(),
});

export const PriceLevelSchema = z.object({
  price: z.number().nullable(),
  size: z.number().nullish(),
  date: z.number().nullish(),
});

export const MarketDataValueSchema = z.union([z.number(), PriceLevelSchema, z.array(PriceLevelSchema), z.null()]);

export const MarketDataFrameSchema = z.object({
  type: z.string(),
  timestamp: z.number().optional(),
  instrumentId: InstrumentIdSchema,
  marketData: z.record(z.string(), MarketDataValueSchema),
});

export const OrderReportSchema = z.object({
  clOrdId: z.string(),
  status: z.string(),
  orderId: z.string().nullish(),
  proprietary: z.string().nullish(),
  execId: z.string().nullish(),
  accountId: z.object({ id: z.string() }).nullish(),
  instrumentId: InstrumentIdSchema.nullish(),
  price: z.number().nullish(),
  orderQty: z.number().nullish(),
  ordType: z.string().nullish(),
  side: z.string().nullish(),
  timeInForce: z.string().nullish(),
  transactTime: z.string().nullish(),
  avgPx: z.number().nullish(),
  lastPx: z.number().nullish(),
  lastQty: z.number().nullish(),
  cumQty: z.number().nullish(),
  leavesQty: z.number().nullish(),
  text: z.string().nullish(),
});

export const OrderReportFrameSchema = z.object({
  type: z.string(),
  orderReport: OrderReportSchema,
});

/** status=ERROR の応答（WebSocket・REST 共通） */
export const ErrorBodySchema = z.object({
  status: z.literal('ERROR'),
  description: z.string().optional(),
  message: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
});

export const LoginResponseSchema = z.object({
  type: z.string(),
  status: z.string().optional(),
  description: z.string().optional(),
});

const TickerSchema = z.string().trim().min(1, 'ticker must not be blank');
const AccountSchema = z.string().trim().min(1, 'account is required');

export const LoginRequestSchema = z.object({
  token: z.string().min(1, 'token is required'),
});

export const MarketDataRequestSchema = z.object({
  tickers: z.array(TickerSchema).min(1, 'at least one ticker is required'),
  entries: z.array(z.nativeEnum(MarketDataEntry)).min(1, 'at least one market data entry is required'),
  market: z.nativeEnum(Market),
  depth: z.number().int().min(1, 'depth must be at least 1'),
});

export const OrderReportSubscribeRequestSchema = z.object({
  account: AccountSchema,
  snapshotOnlyActive: z.boolean(),
});

export const OrderReportUnsubscribeRequestSchema = z.object({
  account: AccountSchema,
});

export const OrderRequestSchema = z
  .object({
    ticker: TickerSchema,
    market: z.nativeEnum(Market),
    side: z.nativeEnum(Side),
    size: z.number().positive('size must be positive'),
    orderType: z.nativeEnum(OrderType),
    timeInForce: z.nativeEnum(TimeInForce),
    account: AccountSchema,
    price: z.number().positive('price must be positive').optional(),
    cancelPrevious: z.boolean(),
    iceberg: z.boolean(),
    expireDate: z
      .string()
      .regex(/^\d{8}$/, 'expireDate must be formatted as yyyyMMdd')
      .optional(),
    displayQuantity: z.number().int().positive('displayQuantity must be positive').optional(),
    clientOrderId: z.string().min(1).optional(),
  })
  .superRefine((order, ctx) => {
    if (order.orderType === OrderType.LIMIT && order.price === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['price'], message: 'price is required for limit orders' });
    }
    if (order.timeInForce === TimeInForce.GOOD_TILL_DATE && order.expireDate === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['expireDate'],
        message: 'expireDate is required for GTD orders',
      });
    }
    if (order.iceberg && order.displayQuantity === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['displayQuantity'],
        message: 'displayQuantity is required for iceberg orders',
      });
    }
  });

export const CancelOrderRequestSchema = z.object({
  clientOrderId: z.string().trim().min(1, 'clientOrderId is required'),
  proprietary: z.string().trim().min(1, 'proprietary is required'),
});

/**
 * zod の検証結果を `path: message` 形式の行にする。
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
