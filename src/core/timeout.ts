export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, timeoutError: Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeout = setTimeout(() => reject(timeoutError), timeoutMs);

    promise
      .then((value) => {
        clearTimeout(timeout);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timeout);
        reject(error);
      });
  });
}

export type Clock = () => number;

/**
 * Wall-clock budget shared by every platform and URL of one request.
 * Only consulted before new work starts; in-flight calls run to their own
 * sub-timeout.
 */
export class Deadline {
  private readonly startedAt: number;
  private readonly expiresAt: number;

  constructor(
    public readonly timeoutSeconds: number,
    private readonly clock: Clock = Date.now
  ) {
    this.startedAt = clock();
    this.expiresAt = this.startedAt + timeoutSeconds * 1000;
  }

  expired(): boolean {
    return this.clock() >= this.expiresAt;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.clock());
  }

  elapsedMs(): number {
    return this.clock() - this.startedAt;
  }
}
