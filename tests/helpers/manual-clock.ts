/**
 * Manually driven millisecond clock
 *
 * Pass `clock.now` wherever a Clock is accepted; time only moves when the
 * test calls `set()` or `advance()`.
 */
export class ManualClock {
  private current: number;

  constructor(startAt = 0) {
    this.current = startAt;
  }

  now = (): number => this.current;

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
