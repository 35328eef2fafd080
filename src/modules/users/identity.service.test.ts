import { createTestStorage } from '../../test.utils';
import { parseIdList } from './identity.service';

describe('IdentityService', () => {
  it('registers inactive users and indexes username and email', async () => {
    const { storage, store, ctx } = createTestStorage();
    const result = await storage.registerUser('alice', 'Alice@Example.test', 'test-password');
    if (!result.success) throw new Error(result.error.message);

    expect(result.data).toMatchObject({ username: 'alice', email: 'alice@example.test', isActive: false });
    expect(result.data).not.toHaveProperty('passwordHash');
    expect(await store.get(ctx.keys.username('alice'))).toBe(result.data.id);
    expect(await store.get(ctx.keys.email('alice@example.test'))).toBe(result.data.id);
  });

  it('rejects an email that is already claimed', async () => {
    const { storage } = createTestStorage();
    await storage.registerUser('alice', 'shared@example.test', 'test-password');
    const second = await storage.registerUser('bob', 'SHARED@example.test', 'test-password');
    expect(second).toEqual({
      success: false,
      error: { kind: 'OperationError', reason: 'conflict', message: 'Email already registered' },
    });
  });

  it('fans out logins over accounts sharing a username', async () => {
    const { storage, store, ctx } = createTestStorage();
    const first = await storage.registerUser('sam', 'sam1@example.test', 'first-pass');
    const second = await storage.registerUser('sam', 'sam2@example.test', 'second-pass');
    if (!first.success || !second.success) throw new Error('registration failed');

    expect(parseIdList(await store.get(ctx.keys.username('sam')))).toEqual([first.data.id, second.data.id]);

    const asSecond = await storage.loginUser('sam', 'second-pass');
    expect(asSecond.success && asSecond.data.id).toBe(second.data.id);
    const asFirst = await storage.loginUser('sam', 'first-pass');
    expect(asFirst.success && asFirst.data.id).toBe(first.data.id);
  });

  it('gives the same answer for a wrong password and an unknown user', async () => {
    const { storage } = createTestStorage();
    await storage.registerUser('alice', 'alice@example.test', 'test-password');
    const wrongPassword = await storage.loginUser('alice', 'nope-nope');
    const unknownUser = await storage.loginUser('nobody', 'test-password');
    const expected = { success: false, error: { kind: 'NotFound', message: 'Invalid credentials' } };
    expect(wrongPassword).toEqual(expected);
    expect(unknownUser).toEqual(expected);
  });

  it('keeps both registrations when the same username registers concurrently', async () => {
    const { storage, store, ctx } = createTestStorage();
    const results = await Promise.all([
      storage.registerUser('twin', 'twin1@example.test', 'test-password'),
      storage.registerUser('twin', 'twin2@example.test', 'test-password'),
    ]);
    expect(results.every((r) => r.success)).toBe(true);
    expect(parseIdList(await store.get(ctx.keys.username('twin')))).toHaveLength(2);
  });

  it('looks users up by id, username and email', async () => {
    const { storage } = createTestStorage();
    const created = await storage.registerUser('carol', 'carol@example.test', 'test-password');
    if (!created.success) throw new Error(created.error.message);

    expect((await storage.getUserById(created.data.id)).success).toBe(true);
    const byName = await storage.getUser('carol');
    expect(byName.success && byName.data.id).toBe(created.data.id);
    const byEmail = await storage.getUserByEmail(' CAROL@example.test');
    expect(byEmail.success && byEmail.data.id).toBe(created.data.id);
    const missing = await storage.getUserByEmail('nobody@example.test');
    expect(missing.success ? undefined : missing.error.kind).toBe('NotFound');
  });

  it('changes passwords', async () => {
    const { storage } = createTestStorage();
    const created = await storage.registerUser('dave', 'dave@example.test', 'old-password');
    if (!created.success) throw new Error(created.error.message);

    expect((await storage.updatePassword(created.data.id, 'new-password')).success).toBe(true);
    expect((await storage.loginUser('dave', 'old-password')).success).toBe(false);
    expect((await storage.loginUser('dave', 'new-password')).success).toBe(true);
  });

  it('moves the email index on profile update and refuses a taken address', async () => {
    const { storage, store, ctx } = createTestStorage();
    const erin = await storage.registerUser('erin', 'erin@example.test', 'test-password');
    await storage.registerUser('frank', 'frank@example.test', 'test-password');
    if (!erin.success) throw new Error(erin.error.message);

    const moved = await storage.updateProfile(erin.data.id, { email: 'Erin.New@example.test', firstName: 'Erin', lastName: 'Smith' });
    expect(moved.success && moved.data).toMatchObject({ email: 'erin.new@example.test', firstName: 'Erin', lastName: 'Smith' });
    expect(await store.get(ctx.keys.email('erin@example.test'))).toBeNull();
    expect(await store.get(ctx.keys.email('erin.new@example.test'))).toBe(erin.data.id);

    const taken = await storage.updateProfile(erin.data.id, { email: 'frank@example.test', firstName: 'E', lastName: 'S' });
    expect(taken.success ? undefined : taken.error).toEqual({
      kind: 'OperationError',
      reason: 'conflict',
      message: 'Email already in use',
    });
  });

  it('activates, deactivates and tracks admins', async () => {
    const { storage } = createTestStorage();
    const user = await storage.registerUser('gina', 'gina@example.test', 'test-password');
    if (!user.success) throw new Error(user.error.message);

    const active = await storage.activateUser(user.data.id);
    expect(active.success && active.data.isActive).toBe(true);
    const inactive = await storage.deactivateUser(user.data.id);
    expect(inactive.success && inactive.data.isActive).toBe(false);

    expect(await storage.isUserAdmin(user.data.id)).toEqual({ success: true, data: false });
    await storage.grantAdmin(user.data.id);
    expect(await storage.isUserAdmin(user.data.id)).toEqual({ success: true, data: true });
    expect(await storage.getAllAdmins()).toEqual({ success: true, data: [user.data.id] });
  });

  it('purges everything a deleted user owned', async () => {
    const { storage, store } = createTestStorage();
    const keep = await storage.registerUser('henk', 'henk1@example.test', 'test-password');
    const gone = await storage.registerUser('henk', 'henk2@example.test', 'test-password');
    if (!keep.success || !gone.success) throw new Error('registration failed');
    const id = gone.data.id;

    const medicine = await storage.medicines.create(id, { name: 'X', dose: 1, unit: 'mg', stock: 5 });
    await storage.schedules.create(id, { medicineId: medicine.id, time: '08:00', amount: 1, daysOfWeek: [] });
    await storage.histories.record(id, medicine.id, 1);
    await storage.createPasswordResetToken(id);
    await storage.grantAdmin(id);

    expect((await storage.deleteUser(id)).success).toBe(true);

    expect(store.keys(`*${id}*`)).toEqual([]);
    expect(await storage.getAllAdmins()).toEqual({ success: true, data: [] });
    const remaining = await storage.getAllUsers();
    expect(remaining.success && remaining.data.map((u) => u.id)).toEqual([keep.data.id]);
    expect((await storage.getUser('henk')).success).toBe(true);
  });
});
