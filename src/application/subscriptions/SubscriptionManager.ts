import type { Logger } from '@/application/interfaces/Logger';
import type { MessageCodec } from '@/application/interfaces/MessageCodec';
import type {
  MarketDataRequest,
  OrderReportSubscribeRequest,
  OutboundRequest,
  OutboundRequestType,
} from '@/domain/models/OutboundRequest';
import type {
  MarketDataSubscription,
  MarketDataSubscriptionSpec,
  OrderReportSubscription,
  OrderReportSubscriptionSpec,
  Subscription,
} from '@/domain/models/Subscription';
import { ALL_MARKET_DATA_ENTRIES, Market } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * 購読フレームの送信先（StreamingSession が実装する）
 */
export interface FrameSender {
  isActive(): boolean;
  /**
   * @throws {TransportError} セッションが Active でない場合
   */
  send(frame: string, type: OutboundRequestType): void;
}

interface RetainedSubscription {
  subscription: Subscription;
  frame: string;
}

/**
 * アプリケーション層: 購読の保持と再送
 *
 * 責務:
 * - 購読を作成順に保持する（Map の挿入順）
 * - Active なら即時送信し、そうでなければ次に Active になるまで送信を保留する
 * - Active への遷移ごとに全購読を作成順で再送する
 *
 * 検証はコーデックの encode で行うため、不正な購読は記録されず何も送られない。
 */
export class SubscriptionManager {
  private readonly retained = new Map<string, RetainedSubscription>();
  private sequence = 0;
  private readonly logger: Logger;

  constructor(
    private readonly codec: MessageCodec,
    private readonly sender: FrameSender,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'SubscriptionManager' });
  }

  /**
   * @throws {ValidationError} 銘柄リストが空、または未知のエントリを含む場合
   */
  subscribeMarketData(spec: MarketDataSubscriptionSpec): MarketDataSubscription {
    const request: MarketDataRequest = {
      type: 'subscribe-market-data',
      tickers: spec.tickers,
      entries: spec.entries ?? ALL_MARKET_DATA_ENTRIES,
      market: spec.market ?? Market.ROFEX,
      depth: spec.depth ?? 1,
    };
    const frame = this.codec.encode(request);

    const subscription: MarketDataSubscription = {
      id: this.nextId(),
      kind: 'market-data',
      tickers: [...request.tickers],
      entries: [...request.entries],
      market: request.market,
      depth: request.depth,
    };
    this.retain(subscription, frame, request.type);
    return subscription;
  }

  /**
   * @throws {ValidationError} 口座が空の場合
   */
  subscribeOrderReports(spec: OrderReportSubscriptionSpec): OrderReportSubscription {
    const request: OrderReportSubscribeRequest = {
      type: 'subscribe-order-reports',
      account: spec.account,
      snapshotOnlyActive: spec.snapshotOnlyActive ?? true,
    };
    const frame = this.codec.encode(request);

    const subscription: OrderReportSubscription = {
      id: this.nextId(),
      kind: 'order-report',
      account: request.account,
      snapshotOnlyActive: request.snapshotOnlyActive,
    };
    this.retain(subscription, frame, request.type);
    return subscription;
  }

  /**
   * 購読を削除する。Active なら解除フレームを送る。
   * @returns 該当する購読があった場合 true
   */
  unsubscribe(id: string): boolean {
    const entry = this.retained.get(id);
    if (!entry) {
      return false;
    }
    this.retained.delete(id);

    if (this.sender.isActive()) {
      const request = toCancellation(entry.subscription);
      this.sender.send(this.codec.encode(request), request.type);
    }
    this.logger.info('Subscription removed', { id });
    return true;
  }

  /**
   * 作成順の購読一覧
   */
  list(): Subscription[] {
    return [...this.retained.values()].map((entry) => entry.subscription);
  }

  /**
   * 保持している全購読を作成順に再送する。
   * @returns 送信した購読数
   */
  replay(): number {
    const snapshot = [...this.retained.values()];
    for (const { subscription, frame } of snapshot) {
      this.sender.send(frame, subscriptionRequestType(subscription));
    }
    return snapshot.length;
  }

  clear(): void {
    this.retained.clear();
  }

  private retain(subscription: Subscription, frame: string, type: OutboundRequestType): void {
    this.retained.set(subscription.id, { subscription, frame });
    if (this.sender.isActive()) {
      this.sender.send(frame, type);
      this.logger.info('Subscription sent', { id: subscription.id, kind: subscription.kind });
    } else {
      this.logger.info('Subscription deferred until session is active', {
        id: subscription.id,
        kind: subscription.kind,
      });
    }
  }

  private nextId(): string {
    this.sequence += 1;
    return `sub-${this.sequence}`;
  }
}

function subscriptionRequestType(subscription: Subscription): OutboundRequestType {
  return subscription.kind === 'market-data' ? 'subscribe-market-data' : 'subscribe-order-reports';
}

function toCancellation(subscription: Subscription): OutboundRequest {
  if (subscription.kind === 'market-data') {
    return {
      type: 'unsubscribe-market-data',
      tickers: subscription.tickers,
      entries: subscription.entries,
      market: subscription.market,
      depth: subscription.depth,
    };
  }
  return { type: 'unsubscribe-order-reports', account: subscription.account };
}
