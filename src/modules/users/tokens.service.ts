import { StorageContext } from '../../storage/context';
import { StoreFailure, storeErrors } from '../../storage/errors';
import { DirectTokenKind } from '../../storage/keys';
import { generateToken } from '../../security/crypto';
import { safeLogger } from '../../security/safeLogger';

const INVALID_RESET = 'Invalid or expired password reset token';
const INVALID_ACTIVATION = 'Invalid or expired activation token';
const INVALID_SESSION = 'Invalid or expired session';

/**
 * Single-use and session tokens. Every token key carries a TTL so unconsumed tokens
 * expire on their own.
 */
export class TokenService {
  constructor(private readonly ctx: StorageContext) {}

  async createPasswordResetToken(userId: string): Promise<string> {
    const token = generateToken();
    await this.ctx.store.set(
      this.ctx.keys.ownedToken('password_reset', userId, token),
      userId,
      this.ctx.tokens.resetTtlSeconds
    );
    return token;
  }

  /**
   * Reset keys embed the user id before the token, so the token is found by scanning.
   * More than one match is refused rather than resolved. Returns the owning user id.
   */
  async consumePasswordResetToken(token: string): Promise<string> {
    const keys = this.ctx.keys;
    const matches = await this.ctx.scanner.scanAll(keys.ownedTokenPattern('password_reset', token));
    if (matches.length === 0) throw new StoreFailure(storeErrors.notFound(INVALID_RESET));
    if (matches.length > 1) {
      safeLogger.warn('auth.reset_token.ambiguous', { matches: matches.length });
      throw new StoreFailure(storeErrors.operation('Password reset token matches more than one account', 'ambiguous_token'));
    }

    const [key] = matches;
    const userId = keys.ownerOfToken('password_reset', key);
    if (!userId) throw new StoreFailure(storeErrors.notFound(INVALID_RESET));
    // A concurrent verification that deleted it first wins.
    if ((await this.ctx.store.del([key])) === 0) throw new StoreFailure(storeErrors.notFound(INVALID_RESET));
    return userId;
  }

  createActivationToken(userId: string): Promise<string> {
    return this.#issueDirect('verification', userId, this.ctx.tokens.verificationTtlSeconds);
  }

  async consumeActivationToken(token: string): Promise<string> {
    const key = this.ctx.keys.directToken('verification', token);
    const userId = await this.ctx.store.get(key);
    if (!userId || (await this.ctx.store.del([key])) === 0) {
      throw new StoreFailure(storeErrors.notFound(INVALID_ACTIVATION));
    }
    return userId;
  }

  createSession(userId: string): Promise<string> {
    return this.#issueDirect('session', userId, this.ctx.tokens.sessionTtlSeconds);
  }

  async resolveSession(token: string): Promise<string> {
    const userId = await this.ctx.store.get(this.ctx.keys.directToken('session', token));
    if (!userId) throw new StoreFailure(storeErrors.notFound(INVALID_SESSION));
    return userId;
  }

  async revokeSession(token: string): Promise<boolean> {
    return (await this.ctx.store.del([this.ctx.keys.directToken('session', token)])) > 0;
  }

  async #issueDirect(kind: DirectTokenKind, userId: string, ttlSeconds: number): Promise<string> {
    const token = generateToken();
    await this.ctx.store.set(this.ctx.keys.directToken(kind, token), userId, ttlSeconds);
    return token;
  }
}
