import { FakeCredentialProvider } from '@test/unit/helpers/fakes/FakeCredentialProvider';
import { calledHeaders, calledUrl, type FetchMock, fakeFetch, jsonResponse } from '@test/unit/helpers/fakes/fakeFetch';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it } from 'vitest';
import { ApiError, ProtocolError, TokenExpiredError, TransportError, ValidationError } from '@/domain/errors';
import type { OrderRequest } from '@/domain/models/Order';
import { Market, MarketDataEntry, OrderType, Side, TimeInForce } from '@/domain/types';
import { RestClient } from '@/infra/rest/RestClient';

const BASE_URL = 'https://api.example.test/';

const ORDER_ACK = { status: 'OK', order: { clientId: '12345', proprietary: 'PBCP' } };

/**
 * 単体テスト: RestClient
 *
 * - エンドポイントとクエリの組み立て
 * - 401 時のトークン再取得
 * - 失敗応答のエラー変換
 */
describe('RestClient', () => {
  let credentials: FakeCredentialProvider;
  let loggerMock: LoggerMock;

  beforeEach(() => {
    credentials = new FakeCredentialProvider();
    loggerMock = new LoggerMock();
  });

  function createClient(fetchMock: FetchMock): RestClient {
    return new RestClient({ baseUrl: BASE_URL, credentials, fetchFn: fetchMock, logger: loggerMock });
  }

  const limitOrder: OrderRequest = {
    ticker: 'DODic19',
    market: Market.ROFEX,
    side: Side.BUY,
    size: 10,
    orderType: OrderType.LIMIT,
    timeInForce: TimeInForce.DAY,
    account: 'test-account',
    price: 55.5,
    cancelPrevious: false,
    iceberg: false,
  };

  describe('参照系', () => {
    it('getSegments() はトークン付きで GET し、応答の追加項目も残す', async () => {
      const body = {
        status: 'OK',
        segments: [{ marketSegmentId: 'DDF', marketId: 'ROFX', extra: 1 }],
      };
      const fetchMock = fakeFetch(jsonResponse(body));

      const result = await createClient(fetchMock).getSegments();

      expect(result).toEqual(body);
      expect(calledUrl(fetchMock, 0)).toBe('https://api.example.test/rest/segment/all');
      expect(calledHeaders(fetchMock, 0).get('X-Auth-Token')).toBe('test-token');
    });

    it('getAllInstruments() / getDetailedInstruments() のパス', async () => {
      const body = { status: 'OK', instruments: [{ instrumentId: { symbol: 'DODic19', marketId: 'ROFX' } }] };
      const fetchMock = fakeFetch(jsonResponse(body), jsonResponse(body));
      const client = createClient(fetchMock);

      await client.getAllInstruments();
      await client.getDetailedInstruments();

      expect(calledUrl(fetchMock, 0)).toBe('https://api.example.test/rest/instruments/all');
      expect(calledUrl(fetchMock, 1)).toBe('https://api.example.test/rest/instruments/details');
    });

    it('getInstrumentDetails() は銘柄と市場をクエリに付ける', async () => {
      const fetchMock = fakeFetch(
        jsonResponse({ status: 'OK', instrument: { instrumentId: { symbol: 'DODic19', marketId: 'ROFX' } } })
      );

      await createClient(fetchMock).getInstrumentDetails('DODic19');

      expect(calledUrl(fetchMock, 0)).toBe(
        'https://api.example.test/rest/instruments/detail?symbol=DODic19&marketId=ROFX'
      );
    });

    it('getMarketData() はエントリをカンマ区切りで送る', async () => {
      const fetchMock = fakeFetch(
        jsonResponse({ status: 'OK', marketData: { LA: { price: 55.8, size: 2 } }, depth: 2, aggregated: true })
      );

      const result = await createClient(fetchMock).getMarketData({
        ticker: 'DODic19',
        entries: [MarketDataEntry.BIDS, MarketDataEntry.LAST],
        depth: 2,
      });

      expect(result.marketData).toEqual({ LA: { price: 55.8, size: 2 } });
      expect(calledUrl(fetchMock, 0)).toBe(
        'https://api.example.test/rest/marketdata/get?marketId=ROFX&symbol=DODic19&entries=BI%2CLA&depth=2'
      );
    });

    it('getTradeHistory() は期間をクエリに付ける', async () => {
      const fetchMock = fakeFetch(jsonResponse({ status: 'OK', trades: [{ price: 55.8, size: 1 }] }));

      await createClient(fetchMock).getTradeHistory({
        ticker: 'DODic19',
        startDate: '2019-12-01',
        endDate: '2019-12-15',
      });

      expect(calledUrl(fetchMock, 0)).toBe(
        'https://api.example.test/rest/data/getTrades?marketId=ROFX&symbol=DODic19&dateFrom=2019-12-01&dateTo=2019-12-15'
      );
    });

    it('getOrderStatus() / getAllOrdersByAccount() のパス', async () => {
      const order = { clOrdId: '12345', status: 'NEW', proprietary: 'PBCP' };
      const fetchMock = fakeFetch(
        jsonResponse({ status: 'OK', order }),
        jsonResponse({ status: 'OK', orders: [order] })
      );
      const client = createClient(fetchMock);

      const status = await client.getOrderStatus('12345', 'PBCP');
      const orders = await client.getAllOrdersByAccount('test-account');

      expect(status.order.status).toBe('NEW');
      expect(orders.orders).toHaveLength(1);
      expect(calledUrl(fetchMock, 0)).toBe('https://api.example.test/rest/order/id?clOrdId=12345&proprietary=PBCP');
      expect(calledUrl(fetchMock, 1)).toBe('https://api.example.test/rest/order/all?accountId=test-account');
    });
  });

  describe('sendOrder()', () => {
    it('指値注文のパラメータを組み立てる', async () => {
      const fetchMock = fakeFetch(jsonResponse(ORDER_ACK));

      const ack = await createClient(fetchMock).sendOrder(limitOrder);

      expect(ack.order).toEqual({ clientId: '12345', proprietary: 'PBCP' });
      expect(calledUrl(fetchMock, 0)).toBe(
        'https://api.example.test/rest/order/newSingleOrder?marketId=ROFX&symbol=DODic19&orderQty=10&ordType=limit&side=buy&timeInForce=Day&account=test-account&cancelPrevious=false&price=55.5'
      );
    });

    it('GTD とアイスバーグの項目を付ける', async () => {
      const fetchMock = fakeFetch(jsonResponse(ORDER_ACK));

      await createClient(fetchMock).sendOrder({
        ...limitOrder,
        timeInForce: TimeInForce.GOOD_TILL_DATE,
        expireDate: '20191220',
        iceberg: true,
        displayQuantity: 2,
      });

      expect(calledUrl(fetchMock, 0)).toBe(
        'https://api.example.test/rest/order/newSingleOrder?marketId=ROFX&symbol=DODic19&orderQty=10&ordType=limit&side=buy&timeInForce=GTD&account=test-account&cancelPrevious=false&price=55.5&expireDate=20191220&iceberg=true&displayQty=2'
      );
    });

    it('成行注文には価格を付けない', async () => {
      const fetchMock = fakeFetch(jsonResponse(ORDER_ACK));

      await createClient(fetchMock).sendOrder({ ...limitOrder, orderType: OrderType.MARKET, price: undefined });

      expect(calledUrl(fetchMock, 0)).not.toContain('price=');
    });

    it('不正な注文は送信せずに ValidationError', async () => {
      const fetchMock = fakeFetch();

      await expect(createClient(fetchMock).sendOrder({ ...limitOrder, size: 0 })).rejects.toThrow(
        'invalid order: size: size must be positive'
      );
      await expect(createClient(fetchMock).sendOrder({ ...limitOrder, size: 0 })).rejects.toThrow(ValidationError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('cancelOrder()', () => {
    it('取消エンドポイントを呼ぶ', async () => {
      const fetchMock = fakeFetch(jsonResponse(ORDER_ACK));

      await createClient(fetchMock).cancelOrder('12345', 'PBCP');

      expect(calledUrl(fetchMock, 0)).toBe(
        'https://api.example.test/rest/order/cancelById?clOrdId=12345&proprietary=PBCP'
      );
    });
  });

  describe('トークンの再取得', () => {
    it('401 ならトークンを取得し直して 1 回だけ再送する', async () => {
      const fetchMock = fakeFetch(
        new Response('', { status: 401 }),
        jsonResponse({ status: 'OK', segments: [] })
      );

      await createClient(fetchMock).getSegments();

      expect(credentials.refresh).toHaveBeenCalledTimes(1);
      expect(calledHeaders(fetchMock, 1).get('X-Auth-Token')).toBe('test-token-refreshed');
      expect(loggerMock.warn).toHaveBeenCalledWith('Token rejected, refreshing', { path: 'rest/segment/all' });
    });

    it('再送しても 401 なら TokenExpiredError でキャッシュを破棄する', async () => {
      const fetchMock = fakeFetch(new Response('', { status: 401 }), new Response('', { status: 401 }));

      await expect(createClient(fetchMock).getSegments()).rejects.toThrow(TokenExpiredError);
      expect(credentials.invalidate).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('エラー変換', () => {
    it('401 以外の失敗ステータスは ApiError', async () => {
      const fetchMock = fakeFetch(new Response('Internal Server Error', { status: 500 }));

      const error = await createClient(fetchMock)
        .getSegments()
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(ApiError);
      expect(error instanceof ApiError ? [error.message, error.status, error.body] : []).toEqual([
        'request failed with status 500: rest/segment/all',
        500,
        'Internal Server Error',
      ]);
    });

    it('status=ERROR の応答は description を持つ ApiError', async () => {
      const fetchMock = fakeFetch(jsonResponse({ status: 'ERROR', description: 'Instrument not found' }));

      await expect(createClient(fetchMock).getInstrumentDetails('NOPE')).rejects.toThrow(
        new ApiError('Instrument not found', 200, '')
      );
    });

    it('JSON でない応答は ProtocolError', async () => {
      const fetchMock = fakeFetch(new Response('<html></html>', { status: 200 }));

      await expect(createClient(fetchMock).getSegments()).rejects.toThrow(ProtocolError);
    });

    it('スキーマに合わない応答は ProtocolError', async () => {
      const fetchMock = fakeFetch(jsonResponse({ status: 'OK' }));

      await expect(createClient(fetchMock).getSegments()).rejects.toThrow(ProtocolError);
    });

    it('通信失敗は TransportError', async () => {
      const fetchMock = fakeFetch(new Error('socket hang up'));

      await expect(createClient(fetchMock).getSegments()).rejects.toThrow(
        'request failed: https://api.example.test/rest/segment/all'
      );
      await expect(createClient(fakeFetch(new Error('socket hang up'))).getSegments()).rejects.toThrow(
        TransportError
      );
    });
  });
});
