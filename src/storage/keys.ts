export type EntityType = 'medicine' | 'schedule' | 'dosagehistory';

/** Tokens whose key embeds the owning user id; verification has to scan. */
export type OwnedTokenKind = 'password_reset';

/** Tokens keyed directly by the token value; verification is a single GET. */
export type DirectTokenKind = 'verification' | 'session';

const GLOB_SPECIALS = /[*?[\]\\]/g;

export function escapeGlob(segment: string): string {
  return segment.replace(GLOB_SPECIALS, (c) => `\\${c}`);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Deterministic key layout. Every key starts with `<namespace>:<environment>` so two
 * environments sharing one Redis instance never see each other's data.
 */
export class KeySchema {
  readonly prefix: string;

  constructor(readonly namespace: string, readonly environment: string) {
    this.prefix = `${namespace}:${environment}`;
  }

  entity(type: EntityType, ownerId: string, id: string): string {
    return `${this.prefix}:user:${ownerId}:${type}:${id}`;
  }

  entityPattern(type: EntityType, ownerId: string): string {
    return `${this.prefix}:user:${escapeGlob(ownerId)}:${type}:*`;
  }

  /** Every entity key owned by `ownerId`, regardless of type. */
  ownerPattern(ownerId: string): string {
    return `${this.prefix}:user:${escapeGlob(ownerId)}:*`;
  }

  user(userId: string): string {
    return `${this.prefix}:user:id:${userId}`;
  }

  userPattern(): string {
    return `${this.prefix}:user:id:*`;
  }

  username(username: string): string {
    return `${this.prefix}:user:username:${username}`;
  }

  email(email: string): string {
    return `${this.prefix}:user:email:${normalizeEmail(email)}`;
  }

  ownedToken(kind: OwnedTokenKind, ownerId: string, token: string): string {
    return `${this.prefix}:${kind}:${ownerId}:${token}`;
  }

  ownedTokenPattern(kind: OwnedTokenKind, token: string): string {
    return `${this.prefix}:${kind}:*:${escapeGlob(token)}`;
  }

  ownedTokensOfUserPattern(kind: OwnedTokenKind, ownerId: string): string {
    return `${this.prefix}:${kind}:${escapeGlob(ownerId)}:*`;
  }

  directToken(kind: DirectTokenKind, token: string): string {
    return `${this.prefix}:${kind}:token:${token}`;
  }

  admins(): string {
    return `${this.prefix}:admins`;
  }

  /** Owner id segment of an owned-token key, or undefined when the key is not one. */
  ownerOfToken(kind: OwnedTokenKind, key: string): string | undefined {
    const head = `${this.prefix}:${kind}:`;
    if (!key.startsWith(head)) return undefined;
    const rest = key.slice(head.length);
    const sep = rest.indexOf(':');
    return sep > 0 ? rest.slice(0, sep) : undefined;
  }
}
