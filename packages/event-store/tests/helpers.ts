import type { DomainEvent } from "@twinledger/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "0x52908400098527886E0F7030069857D2E4169EE7",
      correlationId: `call-${counter}`,
      source: "bridge",
    },
    payload,
  };
}
