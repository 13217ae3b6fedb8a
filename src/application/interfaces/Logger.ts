/**
 * ロガーインターフェース
 *
 * 構造化ログを出力する。実装は pino（PinoLogger）。
 * ライブラリの各コンポーネントはこのインターフェースだけに依存する。
 */
export interface Logger {
  /**
   * デバッグレベルのログを出力
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（エラーは `err` キーで渡す）
   */
  debug(msg: string, meta?: object): void;

  info(msg: string, meta?: object): void;

  warn(msg: string, meta?: object): void;

  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * `component` や `environment` などのコンテキストを自動付与するために使用
   */
  child(bindings: object): Logger;
}
