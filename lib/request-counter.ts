export const DAILY_REQUEST_CEILING = 50;

/**
 * Usage counter for model calls. One instance is owned by each composition
 * root (server context, CLI session) and handed to the model client, which
 * increments it once per parsed reply.
 */
export class RequestCounter {
  private count = 0;

  constructor(readonly ceiling: number = DAILY_REQUEST_CEILING) {}

  get value(): number {
    return this.count;
  }

  increment(): number {
    this.count += 1;
    return this.count;
  }

  hasCapacity(): boolean {
    return this.count < this.ceiling;
  }

  reset(): void {
    this.count = 0;
  }
}

export type GateResult = { allowed: true } | { allowed: false; message: string };

/** Runs before the advice pipeline; never inside it. */
export function checkRequestGate(counter: RequestCounter): GateResult {
  if (counter.hasCapacity()) return { allowed: true };
  return {
    allowed: false,
    message: `Daily API limit exceeded (${counter.value}/${counter.ceiling} requests used)`,
  };
}
