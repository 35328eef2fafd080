import { createTestStorage } from '../../test.utils';

async function withUser() {
  const harness = createTestStorage();
  const user = await harness.storage.registerUser('ivy', 'ivy@example.test', 'test-password');
  if (!user.success) throw new Error(user.error.message);
  return { ...harness, userId: user.data.id };
}

describe('TokenService', () => {
  it('resolves a reset token once, then reports NotFound', async () => {
    const { storage, userId } = await withUser();
    const token = await storage.createPasswordResetToken(userId);
    if (!token.success) throw new Error(token.error.message);

    expect(await storage.verifyPasswordResetToken(token.data)).toEqual({
      success: true,
      data: { userId, username: 'ivy' },
    });
    expect(await storage.verifyPasswordResetToken(token.data)).toEqual({
      success: false,
      error: { kind: 'NotFound', message: 'Invalid or expired password reset token' },
    });
  });

  it('stores reset tokens with an expiry under the owner id', async () => {
    const { storage, store, ctx, userId } = await withUser();
    const token = await storage.tokens.createPasswordResetToken(userId);
    const key = ctx.keys.ownedToken('password_reset', userId, token);
    expect(await store.get(key)).toBe(userId);
    expect(store.ttl(key)).toBe(3600);
    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it('refuses a token that matches more than one key', async () => {
    const { storage, store, ctx, userId } = await withUser();
    await store.set(ctx.keys.ownedToken('password_reset', userId, 'dup-token'), userId, 60);
    await store.set(ctx.keys.ownedToken('password_reset', 'someone-else', 'dup-token'), 'someone-else', 60);

    const result = await storage.verifyPasswordResetToken('dup-token');
    expect(result.success ? undefined : result.error).toMatchObject({ kind: 'OperationError', reason: 'ambiguous_token' });
    expect(store.keys('*dup-token')).toHaveLength(2);
  });

  it('does not let a glob in the token match other keys', async () => {
    const { storage, userId } = await withUser();
    await storage.createPasswordResetToken(userId);
    const result = await storage.verifyPasswordResetToken('*');
    expect(result.success ? undefined : result.error.kind).toBe('NotFound');
  });

  it('consumes activation tokens once', async () => {
    const { storage, userId } = await withUser();
    const token = await storage.createActivationToken(userId);
    if (!token.success) throw new Error(token.error.message);

    expect(await storage.verifyActivationToken(token.data)).toEqual({ success: true, data: userId });
    const again = await storage.verifyActivationToken(token.data);
    expect(again.success ? undefined : again.error.kind).toBe('NotFound');
  });

  it('resolves sessions of active users until revoked', async () => {
    const { storage, userId } = await withUser();
    const token = await storage.tokens.createSession(userId);

    const inactive = await storage.resolveSession(token);
    expect(inactive.success ? undefined : inactive.error.kind).toBe('NotFound');

    await storage.activateUser(userId);
    const active = await storage.resolveSession(token);
    expect(active.success && active.data).toMatchObject({ isAdmin: false, sessionId: token, user: { id: userId, username: 'ivy' } });

    expect(await storage.revokeSession(token)).toEqual({ success: true, data: true });
    const revoked = await storage.resolveSession(token);
    expect(revoked.success ? undefined : revoked.error.kind).toBe('NotFound');
  });
});
