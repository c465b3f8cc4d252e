import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Journal } from "@twinledger/ledger";
import { ReplayRegistry } from "../src/replay-registry.js";
import { catchError, transferId } from "./helpers.js";

const journal: Journal = { record: () => {} };

describe("ReplayRegistry", () => {
  it("remembers inserted ids", () => {
    const registry = new ReplayRegistry(journal, 3);
    expect(registry.insert(transferId(1))).toBeUndefined();

    expect(registry.has(transferId(1))).toBe(true);
    expect(registry.has(transferId(2))).toBe(false);
    expect(registry.size).toBe(1);
    expect(registry.cursor).toBe(1);
  });

  it("rejects an id it still remembers", () => {
    const registry = new ReplayRegistry(journal, 3);
    registry.insert(transferId(1));
    expect(catchError(() => registry.insert(transferId(1)))).toMatchObject({ code: "ALREADY_PROCESSED" });
    expect(registry.cursor).toBe(1);
  });

  it("evicts the oldest id once full", () => {
    const registry = new ReplayRegistry(journal, 3);
    for (let i = 0; i < 3; i++) registry.insert(transferId(i));

    expect(registry.insert(transferId(3))).toBe(transferId(0));
    expect(registry.has(transferId(0))).toBe(false);
    expect(registry.size).toBe(3);

    expect(registry.insert(transferId(0))).toBe(transferId(1));
    expect(registry.has(transferId(0))).toBe(true);
  });

  it("rejects a non-positive capacity", () => {
    expect(catchError(() => new ReplayRegistry(journal, 0))).toMatchObject({ code: "INVALID_CONFIGURATION" });
    expect(catchError(() => new ReplayRegistry(journal, 1.5))).toMatchObject({ code: "INVALID_CONFIGURATION" });
  });

  it("remembers exactly the last `capacity` distinct ids", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 8 }),
        fc.array(fc.integer({ min: 0, max: 20 }), { maxLength: 60 }),
        (capacity, stream) => {
          const registry = new ReplayRegistry(journal, capacity);
          const accepted: number[] = [];

          for (const n of stream) {
            const window = accepted.slice(-capacity);
            if (window.includes(n)) {
              expect(() => registry.insert(transferId(n))).toThrow();
            } else {
              registry.insert(transferId(n));
              accepted.push(n);
            }
          }

          const window = accepted.slice(-capacity);
          for (let n = 0; n <= 20; n++) {
            expect(registry.has(transferId(n))).toBe(window.includes(n));
          }
          expect(registry.size).toBe(window.length);
        },
      ),
    );
  });
});
