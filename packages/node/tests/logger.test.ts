import { describe, it, expect } from "vitest";
import { attachAuditLogger, createLogger } from "../src/logger.js";
import { deployBridgePair } from "../src/deployment.js";
import { ALICE, BOB, ONE, captureLogs, manualClock, testConfig } from "./helpers.js";

describe("createLogger", () => {
  it("respects the configured level", () => {
    const { stream, lines } = captureLogs();
    const logger = createLogger({ LOG_LEVEL: "warn", NODE_ENV: "test" }, stream);

    logger.info("dropped");
    logger.warn({ code: "COOLDOWN_NOT_MET" }, "kept");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 40, msg: "kept", code: "COOLDOWN_NOT_MET" });
  });
});

describe("attachAuditLogger", () => {
  function setup() {
    const { stream, lines } = captureLogs();
    const logger = createLogger({ LOG_LEVEL: "info", NODE_ENV: "test" }, stream);
    const deployment = deployBridgePair(testConfig(), { originHolder: ALICE, clock: manualClock().clock });
    return { ...deployment, logger, lines };
  }

  it("logs each committed event with its position", () => {
    const { primary, origin, logger, lines } = setup();
    attachAuditLogger(primary.store, logger);

    origin.transfer(ALICE, BOB, ONE);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "token.transfer",
      type: "token.transfer",
      streamId: `token:${origin.address}`,
      position: 2,
      version: 2,
      eventId: "31337-2",
      actor: ALICE,
    });
  });

  it("logs nothing for a rejected call", () => {
    const { primary, origin, logger, lines } = setup();
    attachAuditLogger(primary.store, logger);

    expect(() => origin.transfer(BOB, ALICE, ONE)).toThrow();
    expect(lines).toHaveLength(0);
  });

  it("stops after unsubscribe", () => {
    const { primary, origin, logger, lines } = setup();
    const subscription = attachAuditLogger(primary.store, logger);
    subscription.unsubscribe();

    origin.transfer(ALICE, BOB, ONE);
    expect(lines).toHaveLength(0);
  });
});
