import type { Clock } from "../../../application/ports/output/clock";

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
