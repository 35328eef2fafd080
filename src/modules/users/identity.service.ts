import { userCodec } from '../../storage/codec';
import { StorageContext, loadRecord, requireRecord } from '../../storage/context';
import { StoreFailure, storeErrors } from '../../storage/errors';
import { normalizeEmail } from '../../storage/keys';
import { User } from '../../storage/records';
import { runGuarded } from '../../storage/transaction';
import { WriteOp } from '../../storage/client';
import { hashPassword, verifyPassword } from '../../security/crypto';

export type ProfileUpdate = { email: string; firstName: string; lastName: string };

const USER_NOT_FOUND = 'User not found';
const INVALID_CREDENTIALS = 'Invalid credentials';

/** Username index values are comma-joined ids; several accounts may share a username. */
export function parseIdList(raw: string | null): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((id) => id.trim())
    .filter(Boolean);
}

export class IdentityService {
  constructor(private readonly ctx: StorageContext) {}

  /**
   * Claims the email, appends the new id to the username index and writes the user in
   * one commit. New accounts start inactive.
   */
  async register(username: string, email: string, password: string): Promise<User> {
    const keys = this.ctx.keys;
    const usernameKey = keys.username(username);
    const claimedEmail = normalizeEmail(email);
    const emailKey = claimedEmail ? keys.email(claimedEmail) : undefined;
    const user: User = {
      id: this.ctx.newId(),
      username,
      email: claimedEmail,
      passwordHash: await hashPassword(password),
      isActive: false,
      firstName: '',
      lastName: '',
      createdAt: this.ctx.now().toISOString(),
    };

    return runGuarded(
      this.ctx.store,
      {
        watchKeys: emailKey ? [usernameKey, emailKey] : [usernameKey],
        maxAttempts: this.ctx.maxAttempts,
        label: 'register user',
      },
      async (session) => {
        if (emailKey && (await session.get(emailKey))) {
          throw new StoreFailure(storeErrors.operation('Email already registered', 'conflict'));
        }
        const ids = parseIdList(await session.get(usernameKey));
        const writes: WriteOp[] = [
          { op: 'set', key: keys.user(user.id), value: userCodec.encode(user) },
          { op: 'set', key: usernameKey, value: [...ids, user.id].join(',') },
        ];
        if (emailKey) writes.push({ op: 'set', key: emailKey, value: user.id });
        return { writes, result: user };
      }
    );
  }

  /** Tries every account under `username`; unknown name and wrong password look the same. */
  async login(username: string, password: string): Promise<User> {
    for (const user of await this.#candidates(username)) {
      if (await verifyPassword(password, user.passwordHash)) return user;
    }
    throw new StoreFailure(storeErrors.notFound(INVALID_CREDENTIALS));
  }

  async getByUsername(username: string): Promise<User> {
    const [first] = await this.#candidates(username);
    if (!first) throw new StoreFailure(storeErrors.notFound(USER_NOT_FOUND));
    return first;
  }

  getById(userId: string): Promise<User> {
    return loadRecord(this.ctx, this.ctx.keys.user(userId), userCodec, USER_NOT_FOUND);
  }

  async getByEmail(email: string): Promise<User> {
    const userId = await this.ctx.store.get(this.ctx.keys.email(email));
    if (!userId) throw new StoreFailure(storeErrors.notFound(USER_NOT_FOUND));
    return this.getById(userId);
  }

  async updatePassword(userId: string, password: string): Promise<User> {
    const passwordHash = await hashPassword(password);
    return this.#modify(userId, 'update password', (user) => ({ ...user, passwordHash }));
  }

  /** Moves the email index entry when the address changes. */
  updateProfile(userId: string, profile: ProfileUpdate): Promise<User> {
    const keys = this.ctx.keys;
    const userKey = keys.user(userId);
    const nextEmail = normalizeEmail(profile.email);
    const nextEmailKey = nextEmail ? keys.email(nextEmail) : undefined;

    return runGuarded(
      this.ctx.store,
      {
        watchKeys: nextEmailKey ? [userKey, nextEmailKey] : [userKey],
        maxAttempts: this.ctx.maxAttempts,
        label: 'update profile',
      },
      async (session) => {
        const current = requireRecord(await session.get(userKey), userCodec, USER_NOT_FOUND);
        const writes: WriteOp[] = [];
        if (nextEmailKey) {
          const owner = await session.get(nextEmailKey);
          if (owner && owner !== userId) {
            throw new StoreFailure(storeErrors.operation('Email already in use', 'conflict'));
          }
        }
        const previousEmail = normalizeEmail(current.email);
        if (previousEmail !== nextEmail) {
          if (previousEmail) writes.push({ op: 'del', key: keys.email(previousEmail) });
          if (nextEmailKey) writes.push({ op: 'set', key: nextEmailKey, value: userId });
        }
        const updated: User = { ...current, email: nextEmail, firstName: profile.firstName, lastName: profile.lastName };
        writes.push({ op: 'set', key: userKey, value: userCodec.encode(updated) });
        return { writes, result: updated };
      }
    );
  }

  setActive(userId: string, isActive: boolean): Promise<User> {
    return this.#modify(userId, isActive ? 'activate user' : 'deactivate user', (user) => ({ ...user, isActive }));
  }

  async listUsers(): Promise<User[]> {
    const users = await this.ctx.scanner.loadAll(this.ctx.keys.userPattern(), userCodec);
    return users.sort((a, b) => a.username.localeCompare(b.username) || a.id.localeCompare(b.id));
  }

  isAdmin(userId: string): Promise<boolean> {
    return this.ctx.store.sismember(this.ctx.keys.admins(), userId);
  }

  listAdmins(): Promise<string[]> {
    return this.ctx.store.smembers(this.ctx.keys.admins());
  }

  async grantAdmin(userId: string): Promise<void> {
    await this.getById(userId);
    await this.ctx.store.sadd(this.ctx.keys.admins(), userId);
  }

  /**
   * Removes the account, its identity index entries, admin membership, every record it
   * owns and its pending reset tokens.
   */
  async delete(userId: string): Promise<void> {
    const keys = this.ctx.keys;
    const userKey = keys.user(userId);
    const existing = await this.getById(userId);
    const usernameKey = keys.username(existing.username);
    const emailKey = existing.email ? keys.email(existing.email) : undefined;

    const [owned, resetTokens] = await Promise.all([
      this.ctx.scanner.scanAll(keys.ownerPattern(userId)),
      this.ctx.scanner.scanAll(keys.ownedTokensOfUserPattern('password_reset', userId)),
    ]);

    await runGuarded(
      this.ctx.store,
      {
        watchKeys: emailKey ? [userKey, usernameKey, emailKey] : [userKey, usernameKey],
        maxAttempts: this.ctx.maxAttempts,
        label: 'delete user',
      },
      async (session) => {
        requireRecord(await session.get(userKey), userCodec, USER_NOT_FOUND);
        const writes: WriteOp[] = [{ op: 'del', key: userKey }];

        const remaining = parseIdList(await session.get(usernameKey)).filter((id) => id !== userId);
        writes.push(
          remaining.length ? { op: 'set', key: usernameKey, value: remaining.join(',') } : { op: 'del', key: usernameKey }
        );
        if (emailKey && (await session.get(emailKey)) === userId) writes.push({ op: 'del', key: emailKey });

        writes.push({ op: 'srem', key: keys.admins(), member: userId });
        [...owned, ...resetTokens].forEach((key) => writes.push({ op: 'del', key }));
        return { writes, result: undefined };
      }
    );
  }

  async #candidates(username: string): Promise<User[]> {
    const ids = parseIdList(await this.ctx.store.get(this.ctx.keys.username(username)));
    if (!ids.length) return [];
    const raws = await this.ctx.store.mget(ids.map((id) => this.ctx.keys.user(id)));
    const users: User[] = [];
    raws.forEach((raw) => {
      const user = raw === null ? null : userCodec.tryDecode(raw);
      if (user) users.push(user);
    });
    return users;
  }

  #modify(userId: string, label: string, change: (user: User) => User): Promise<User> {
    const userKey = this.ctx.keys.user(userId);
    return runGuarded(this.ctx.store, { watchKeys: [userKey], maxAttempts: this.ctx.maxAttempts, label }, async (session) => {
      const updated = change(requireRecord(await session.get(userKey), userCodec, USER_NOT_FOUND));
      return { writes: [{ op: 'set', key: userKey, value: userCodec.encode(updated) }], result: updated };
    });
  }
}
