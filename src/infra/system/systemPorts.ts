import { randomUUID } from "node:crypto";
import type { ClockPort, IdGeneratorPort } from "../../core/ports/outboundPorts";

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Execution ids double as BullMQ job id prefixes, so they must stay colon-free.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
