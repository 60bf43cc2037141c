/**
 * Content Ledger
 * Content-hash dedup set plus the monotonic counter used for output filenames
 */

export interface SerializedLedger {
  seenHashes: string[];
  imageCounter: number;
}

export class ContentLedger {
  private seenHashes: Set<string>;
  private counter: number;

  constructor(seenHashes: Iterable<string> = [], counter = 0) {
    if (!Number.isInteger(counter) || counter < 0) {
      throw new Error(`Invalid image counter: ${counter}`);
    }
    this.seenHashes = new Set(seenHashes);
    this.counter = counter;
  }

  /**
   * Rebuild a ledger from its persisted form
   */
  static fromSerialized(data: SerializedLedger): ContentLedger {
    return new ContentLedger(data.seenHashes, data.imageCounter);
  }

  isDuplicate(hash: string): boolean {
    return this.seenHashes.has(hash);
  }

  /**
   * Mark a hash as seen. Accepting the same hash twice is a no-op.
   */
  accept(hash: string): void {
    this.seenHashes.add(hash);
  }

  /**
   * Issue the next 1-based sequence number
   * Numbers are never handed out twice, even if the caller fails to use one
   */
  nextSequenceNumber(): number {
    this.counter++;
    return this.counter;
  }

  get size(): number {
    return this.seenHashes.size;
  }

  get lastSequenceNumber(): number {
    return this.counter;
  }

  serialize(): SerializedLedger {
    return {
      seenHashes: [...this.seenHashes],
      imageCounter: this.counter,
    };
  }
}
