import { logger } from '../observability/logger.js';
import { ConcurrentMutationError } from './errors.js';

interface Gate {
  promise: Promise<void>;
  open: () => void;
}

function createGate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>(resolve => {
    open = resolve;
  });
  return { promise, open };
}

/**
 * Reader/writer lock for one session. Mutations are exclusive and fail fast
 * instead of queueing behind one another; they wait for in-flight readers to
 * finish. Maintenance writes (installing a background grouping) queue behind
 * whatever holds the lock, and a mutation arriving during one waits for it
 * rather than failing. Readers run together and only wait while a writer
 * holds the lock.
 */
export class SessionLock {
  private writer: Gate | null = null;
  private maintaining = false;
  private readers = 0;
  private drained: Gate | null = null;

  constructor(public readonly changeId: string) {}

  isWriting(): boolean {
    return this.writer !== null;
  }

  async write<T>(operation: () => Promise<T>): Promise<T> {
    while (this.writer && this.maintaining) {
      await this.writer.promise;
    }

    if (this.writer) {
      logger.forChange(this.changeId).warn('session_lock_contended', 'Mutation rejected, another mutation holds the lock', {
        readers: this.readers,
      });
      throw new ConcurrentMutationError(this.changeId);
    }

    return this.hold(false, operation);
  }

  /** Exclusive section that waits its turn instead of failing. */
  async maintain<T>(operation: () => Promise<T>): Promise<T> {
    while (this.writer) {
      await this.writer.promise;
    }
    return this.hold(true, operation);
  }

  async read<T>(operation: () => Promise<T>): Promise<T> {
    while (this.writer) {
      await this.writer.promise;
    }

    this.readers++;
    try {
      return await operation();
    } finally {
      this.readers--;
      if (this.readers === 0 && this.drained) {
        const drained = this.drained;
        this.drained = null;
        drained.open();
      }
    }
  }

  // must claim the writer slot before its first await
  private async hold<T>(maintaining: boolean, operation: () => Promise<T>): Promise<T> {
    const gate = createGate();
    this.writer = gate;
    this.maintaining = maintaining;
    try {
      while (this.readers > 0) {
        this.drained = this.drained ?? createGate();
        await this.drained.promise;
      }
      return await operation();
    } finally {
      this.writer = null;
      this.maintaining = false;
      gate.open();
    }
  }
}

export class SessionLocks {
  private readonly locks = new Map<string, SessionLock>();

  for(changeId: string): SessionLock {
    let lock = this.locks.get(changeId);
    if (!lock) {
      lock = new SessionLock(changeId);
      this.locks.set(changeId, lock);
    }
    return lock;
  }
}
