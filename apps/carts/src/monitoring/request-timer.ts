export type TimerToken = {
  readonly startedAt: bigint;
};

export class TimerMisuseError extends Error {
  constructor(message = 'Request timer was read without having been started') {
    super(message);
    this.name = 'TimerMisuseError';
  }
}

const NANOSECONDS_PER_SECOND = 1_000_000_000;

export type MonotonicClock = () => bigint;

export class RequestTimer {
  constructor(private readonly clock: MonotonicClock = () => process.hrtime.bigint()) {}

  start(): TimerToken {
    return { startedAt: this.clock() };
  }

  /** Seconds elapsed since `start`, never negative. */
  elapsed(token: TimerToken | null | undefined): number {
    if (!token) {
      throw new TimerMisuseError();
    }

    const diff = this.clock() - token.startedAt;
    return diff > 0n ? Number(diff) / NANOSECONDS_PER_SECOND : 0;
  }
}
