import { randomUUID } from "node:crypto";
import type { ClockPort, IdGeneratorPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }

  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

/**
 * Encapsulates identifier generation to keep orchestration independent from UUID implementation.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
