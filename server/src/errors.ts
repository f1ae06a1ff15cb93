/**
 * エラー分類
 *
 * ValidatorError / IssuerError はリクエストを 500 で止める。
 * 詳細はサーバーログにのみ残し、レスポンスには含めない。
 */

class ServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * キーストアが応答できなかった（接続失敗・タイムアウト・不正なデータ）
 */
export class ValidatorError extends ServiceError {}

/**
 * ルーム作成・トークン署名・エージェント解決の失敗
 */
export class IssuerError extends ServiceError {}

/**
 * キーストアの内容が解釈できない
 */
export class KeyStoreError extends ServiceError {}

export class SecretsManagerError extends ServiceError {}

export class ConfigError extends ServiceError {}

export class TimeoutError extends ServiceError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}
