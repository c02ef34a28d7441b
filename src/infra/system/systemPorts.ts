import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
