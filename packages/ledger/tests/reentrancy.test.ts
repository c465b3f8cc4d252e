import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "../src/reentrancy.js";

function reject(): never {
  throw new Error("reentered");
}

describe("ReentrancyGuard", () => {
  it("runs a call and releases afterwards", () => {
    const guard = new ReentrancyGuard();
    expect(guard.run(() => 7, reject)).toBe(7);
    expect(guard.entered).toBe(false);
  });

  it("rejects a nested call", () => {
    const guard = new ReentrancyGuard();
    expect(() => guard.run(() => guard.run(() => 1, reject), reject)).toThrow("reentered");
  });

  it("releases after a throw", () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.run(() => {
        throw new Error("inner");
      }, reject),
    ).toThrow("inner");
    expect(guard.run(() => "again", reject)).toBe("again");
  });

  it("guards are independent", () => {
    const a = new ReentrancyGuard();
    const b = new ReentrancyGuard();
    expect(a.run(() => b.run(() => "both", reject), reject)).toBe("both");
  });
});
