/**
 * Credential Rotator
 * Ordered credential pool with per-credential exhaustion and round-robin failover
 */

import type { Credential, RotatorStatus } from "../types";

export class CredentialRotator {
  private readonly credentials: readonly Credential[];
  private currentIndex = 0;
  private exhausted = new Set<number>();

  constructor(credentials: readonly Credential[]) {
    if (credentials.length === 0) {
      throw new Error("At least one API key/CX pair is required");
    }
    this.credentials = [...credentials];
  }

  get size(): number {
    return this.credentials.length;
  }

  current(): Credential {
    return this.credentials[this.currentIndex];
  }

  /**
   * 1-based position of the active credential, for display
   */
  currentOrdinal(): number {
    return this.currentIndex + 1;
  }

  markExhausted(): void {
    this.exhausted.add(this.currentIndex);
  }

  /**
   * Mark the current credential exhausted and move to the next usable one,
   * scanning forward circularly from the one after the current index.
   * Returns false and leaves the current index untouched when every
   * credential is exhausted.
   */
  rotateToNext(): boolean {
    this.markExhausted();

    const total = this.credentials.length;
    for (let offset = 1; offset <= total; offset++) {
      const candidate = (this.currentIndex + offset) % total;
      if (!this.exhausted.has(candidate)) {
        this.currentIndex = candidate;
        return true;
      }
    }

    return false;
  }

  hasAvailable(): boolean {
    return this.exhausted.size < this.credentials.length;
  }

  /**
   * Clear exhaustion and go back to the first credential (new quota period)
   */
  resetAll(): void {
    this.exhausted.clear();
    this.currentIndex = 0;
  }

  status(): RotatorStatus {
    return {
      currentOrdinal: this.currentOrdinal(),
      total: this.credentials.length,
      exhausted: this.exhausted.size,
      available: this.credentials.length - this.exhausted.size,
    };
  }
}
