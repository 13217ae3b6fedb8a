/**
 * REST エンドポイントのパス（ベース URL からの相対）
 */

type QueryValue = string | number | boolean;

function withQuery(path: string, params: Record<string, QueryValue>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    query.append(key, String(value));
  }
  return `${path}?${query.toString()}`;
}

export const RestPaths = {
  segments: (): string => 'rest/segment/all',
  instruments: (): string => 'rest/instruments/all',
  detailedInstruments: (): string => 'rest/instruments/details',
  instrumentDetail: (symbol: string, marketId: string): string =>
    withQuery('rest/instruments/detail', { symbol, marketId }),
  marketData: (marketId: string, symbol: string, entries: readonly string[], depth: number): string =>
    withQuery('rest/marketdata/get', { marketId, symbol, entries: entries.join(','), depth }),
  trades: (marketId: string, symbol: string, dateFrom: string, dateTo: string): string =>
    withQuery('rest/data/getTrades', { marketId, symbol, dateFrom, dateTo }),
  orderStatus: (clOrdId: string, proprietary: string): string => withQuery('rest/order/id', { clOrdId, proprietary }),
  newOrder: (params: Record<string, QueryValue>): string => withQuery('rest/order/newSingleOrder', params),
  cancelOrder: (clOrdId: string, proprietary: string): string =>
    withQuery('rest/order/cancelById', { clOrdId, proprietary }),
  allOrders: (accountId: string): string => withQuery('rest/order/all', { accountId }),
} as const;
