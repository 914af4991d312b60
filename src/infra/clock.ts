export interface ClockPort {
  nowMs(): number;
}

export class SystemClock implements ClockPort {
  nowMs(): number {
    return Date.now();
  }
}
