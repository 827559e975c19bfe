import { UnknownRunError } from '@/lib/errors';

/**
 * Run id → live run state, owned by one RunController.
 *
 * Every read-modify-write happens synchronously inside a single method,
 * so no two callers can interleave between the lookup and the update.
 */
export class RunRegistry<T> {
  private readonly runs = new Map<string, T>();

  register(id: string, entry: T): void {
    if (this.runs.has(id)) {
      throw new Error(`Run already registered: ${id}`);
    }
    this.runs.set(id, entry);
  }

  /** @throws {UnknownRunError} */
  require(id: string): T {
    const entry = this.runs.get(id);
    if (entry === undefined) {
      throw new UnknownRunError(id);
    }
    return entry;
  }

  /** Remove an entry if the predicate accepts it; returns whether it was removed */
  deleteIf(id: string, predicate: (entry: T) => boolean): boolean {
    const entry = this.runs.get(id);
    if (entry === undefined || !predicate(entry)) return false;
    return this.runs.delete(id);
  }

  values(): T[] {
    return Array.from(this.runs.values());
  }

  get size(): number {
    return this.runs.size;
  }
}
