import { describe, it, expect } from "vitest";
import { ContentLedger } from "./content-ledger";

const HASH_A = "a".repeat(64);
const HASH_B = "b".repeat(64);

describe("ContentLedger", () => {
  it("reports a hash as duplicate only after it is accepted", () => {
    const ledger = new ContentLedger();
    expect(ledger.isDuplicate(HASH_A)).toBe(false);

    ledger.accept(HASH_A);

    expect(ledger.isDuplicate(HASH_A)).toBe(true);
    expect(ledger.isDuplicate(HASH_B)).toBe(false);
  });

  it("treats repeated accepts as idempotent", () => {
    const ledger = new ContentLedger();
    ledger.accept(HASH_A);
    ledger.accept(HASH_A);

    expect(ledger.size).toBe(1);
  });

  it("issues strictly increasing 1-based sequence numbers without gaps", () => {
    const ledger = new ContentLedger();
    const issued = [1, 2, 3, 4, 5].map(() => ledger.nextSequenceNumber());

    expect(issued).toEqual([1, 2, 3, 4, 5]);
    expect(ledger.lastSequenceNumber).toBe(5);
  });

  it("keeps counting from a restored counter", () => {
    const ledger = ContentLedger.fromSerialized({
      seenHashes: [HASH_A],
      imageCounter: 41,
    });

    expect(ledger.nextSequenceNumber()).toBe(42);
    expect(ledger.isDuplicate(HASH_A)).toBe(true);
  });

  it("serializes hashes and counter", () => {
    const ledger = new ContentLedger();
    ledger.accept(HASH_B);
    ledger.accept(HASH_A);
    ledger.nextSequenceNumber();

    expect(ledger.serialize()).toEqual({
      seenHashes: [HASH_B, HASH_A],
      imageCounter: 1,
    });
  });

  it("rejects a negative counter", () => {
    expect(() => new ContentLedger([], -1)).toThrow("Invalid image counter: -1");
  });
});
