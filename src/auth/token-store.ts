/**
 * Token store - holds the current session of one connection
 */

import type { TokenSnapshot } from '../types/index.js';

/**
 * In-memory holder for the connection's current token.
 *
 * Only the owning strategy writes to it, and always with a complete entry,
 * so readers never observe a token without its instance URL.
 */
export class TokenStore {
  private current: TokenSnapshot | null = null;

  get(): TokenSnapshot | null {
    return this.current;
  }

  set(token: TokenSnapshot): void {
    this.current = token;
  }

  /**
   * Mark the current token expired without discarding its instance URL.
   */
  expire(now = Date.now()): void {
    if (this.current) {
      this.current = { ...this.current, expiresAt: now };
    }
  }
}
