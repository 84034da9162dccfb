/**
 * Single-slot holder for the tenant access token.
 */

export interface Credential {
  token: string;
  /** Epoch milliseconds at which the token was obtained */
  acquiredAt: number;
  ttlMs: number;
}

export class CredentialCache {
  private credential: Credential | null = null;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Returns the stored credential, or null once its age reaches the TTL
   */
  get(): Credential | null {
    const current = this.credential;
    if (!current) return null;
    if (this.now() - current.acquiredAt >= current.ttlMs) {
      this.credential = null;
      return null;
    }
    return current;
  }

  set(credential: Credential): void {
    this.credential = { ...credential };
  }

  invalidate(): void {
    this.credential = null;
  }
}
