import { ValidatorError } from '../errors';
import type { KeyStore } from '../keystore';
import { log } from '../log';
import type { AuthorizationRecord, AuthorizationResult } from '../types';
import { withTimeout } from '../utils/timeout';

export interface KeyValidatorOptions {
  timeoutMs: number;
}

/**
 * API キーの検証
 *
 * - キーなし / 空文字 → unauthorized（ストアには問い合わせない）
 * - ストアに登録あり → authorized
 * - ストア障害・タイムアウト → ValidatorError
 */
export class KeyValidator {
  constructor(
    private readonly store: KeyStore,
    private readonly options: KeyValidatorOptions,
  ) {}

  async validate(credential: string | undefined): Promise<AuthorizationResult> {
    if (!credential) {
      log().warn('API key missing in request');
      return { status: 'unauthorized', reason: 'missing' };
    }

    let record: AuthorizationRecord | null;
    try {
      record = await withTimeout('key store lookup', this.options.timeoutMs, (signal) =>
        this.store.lookup(credential, { signal }),
      );
    } catch (error) {
      throw new ValidatorError('Failed to validate API key', { cause: error });
    }

    if (!record) {
      log().warn('Invalid API key provided');
      return { status: 'unauthorized', reason: 'invalid' };
    }

    return { status: 'authorized', record };
  }
}
