import type { DecodedFrame } from '@/domain/models/InboundMessage';
import type { OutboundRequest } from '@/domain/models/OutboundRequest';

/**
 * トランスポートから受け取る生フレーム（ws の RawData とテキスト）
 */
export type FrameData = string | Buffer | ArrayBuffer | Buffer[];

/**
 * メッセージコーデック
 *
 * 責務: 送信要求のワイヤ形式への変換と、受信フレームの型付きメッセージへの変換。
 */
export interface MessageCodec {
  /**
   * 要求を検証してテキストフレームにする。
   * @throws {ValidationError} 要求が不正な場合（何も送られない）
   */
  encode(request: OutboundRequest): string;

  /**
   * フレームを復号する。解釈できないフレームは error カテゴリのメッセージになる。
   */
  decode(data: FrameData): DecodedFrame;
}
