import { RaffleLock } from '../../src/raffles/domain/raffle-lock';

/**
 * Serializes work per key inside one process
 */
export class InProcessRaffleLock implements RaffleLock {
  private readonly tails = new Map<string, Promise<unknown>>();
  readonly acquired: string[] = [];

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous
      .catch(() => undefined)
      .then(() => {
        this.acquired.push(key);
        return work();
      });
    this.tails.set(key, run);
    return run;
  }
}
