import { z } from 'zod';
import { InstrumentIdSchema, MarketDataValueSchema, OrderReportSchema } from '@/infra/codec/schemas';

/**
 * インフラ層: REST 応答のスキーマ
 *
 * 必要な項目だけを検証し、それ以外の項目は passthrough でそのまま残す。
 */

export const SegmentsResponseSchema = z
  .object({
    status: z.string(),
    segments: z.array(z.object({ marketSegmentId: z.string(), marketId: z.string() }).passthrough()),
  })
  .passthrough();
export type SegmentsResponse = z.infer<typeof SegmentsResponseSchema>;

export const InstrumentsResponseSchema = z
  .object({
    status: z.string(),
    instruments: z.array(z.object({ instrumentId: InstrumentIdSchema }).passthrough()),
  })
  .passthrough();
export type InstrumentsResponse = z.infer<typeof InstrumentsResponseSchema>;

export const InstrumentDetailResponseSchema = z
  .object({
    status: z.string(),
    instrument: z.object({ instrumentId: InstrumentIdSchema }).passthrough(),
  })
  .passthrough();
export type InstrumentDetailResponse = z.infer<typeof InstrumentDetailResponseSchema>;

export const MarketDataResponseSchema = z
  .object({
    status: z.string(),
    marketData: z.record(z.string(), MarketDataValueSchema),
    depth: z.number().optional(),
    aggregated: z.boolean().optional(),
  })
  .passthrough();
export type MarketDataResponse = z.infer<typeof MarketDataResponseSchema>;

export const TradesResponseSchema = z
  .object({
    status: z.string(),
    symbol: z.string().optional(),
    market: z.string().optional(),
    trades: z.array(
      z
        .object({
          price: z.number(),
          size: z.number(),
          datetime: z.string().optional(),
          servertime: z.number().optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();
export type TradesResponse = z.infer<typeof TradesResponseSchema>;

export const OrderStatusResponseSchema = z
  .object({
    status: z.string(),
    order: OrderReportSchema.passthrough(),
  })
  .passthrough();
export type OrderStatusResponse = z.infer<typeof OrderStatusResponseSchema>;

export const OrdersResponseSchema = z
  .object({
    status: z.string(),
    orders: z.array(OrderReportSchema.passthrough()),
  })
  .passthrough();
export type OrdersResponse = z.infer<typeof OrdersResponseSchema>;

export const OrderAckResponseSchema = z
  .object({
    status: z.string(),
    order: z.object({ clientId: z.string(), proprietary: z.string() }).passthrough(),
  })
  .passthrough();
export type OrderAckResponse = z.infer<typeof OrderAckResponseSchema>;
