/**
 * Process-lifetime directory of Slack users or channels, keyed by stable ID.
 *
 * Filled by one complete scan on first use and never refreshed. Concurrent
 * callers during the first scan share the same in-flight promise. A failed
 * scan keeps whatever entries it already wrote but leaves the directory
 * unpopulated, so the next lookup scans again.
 *
 * Population is tracked by `state`, not by the directory being non-empty:
 * partial entries from a failed scan do not stop the rescan.
 */

export type DirectoryState = 'empty' | 'loading' | 'populated';

export type DirectoryScan<T> = (add: (entry: T) => void) => Promise<void>;

export class Directory<T extends { id: string }> {
  private readonly entries = new Map<string, T>();
  private state: DirectoryState = 'empty';
  private inFlight: Promise<void> | null = null;

  constructor(private readonly scan: DirectoryScan<T>) {}

  get status(): DirectoryState {
    return this.state;
  }

  get size(): number {
    return this.entries.size;
  }

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  values(): T[] {
    return Array.from(this.entries.values());
  }

  async load(): Promise<void> {
    if (this.state === 'populated') return;
    if (this.inFlight) return this.inFlight;

    this.state = 'loading';
    this.inFlight = this.scan((entry) => {
      this.entries.set(entry.id, entry);
    })
      .then(() => {
        this.state = 'populated';
      })
      .catch((error: unknown) => {
        this.state = 'empty';
        throw error;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }
}
