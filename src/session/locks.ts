import { LockStateError } from '../errors.js';

/**
 * Non-reentrant async mutex. Waiters are served in FIFO order and ownership is handed
 * directly to the next waiter on unlock, so a released lock cannot be stolen in between.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => resolve());
    });
  }

  unlock(): void {
    if (!this.locked) {
      throw new LockStateError('Mutex is not locked');
    }
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async withLock<T>(action: () => Promise<T> | T): Promise<T> {
    await this.lock();
    try {
      return await action();
    } finally {
      this.unlock();
    }
  }
}

interface RWWaiter {
  mode: 'read' | 'write';
  grant: () => void;
}

/**
 * Reader-writer lock. Any number of readers, or one writer. Once a writer is queued, new
 * readers queue behind it.
 */
export class RWLock {
  private readers = 0;
  private writer = false;
  private readonly queue: RWWaiter[] = [];

  async withReadLock<T>(action: () => Promise<T> | T): Promise<T> {
    await this.acquire('read');
    try {
      return await action();
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  async withWriteLock<T>(action: () => Promise<T> | T): Promise<T> {
    await this.acquire('write');
    try {
      return await action();
    } finally {
      this.writer = false;
      this.drain();
    }
  }

  private acquire(mode: 'read' | 'write'): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: () => resolve() });
    });
  }

  private canGrant(mode: 'read' | 'write'): boolean {
    return mode === 'read' ? !this.writer : !this.writer && this.readers === 0;
  }

  private grant(mode: 'read' | 'write'): void {
    if (mode === 'read') {
      this.readers += 1;
    } else {
      this.writer = true;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.mode)) return;
      this.queue.shift();
      this.grant(next.mode);
      next.grant();
      if (next.mode === 'write') return;
    }
  }
}

interface KeyedEntry {
  mutex: Mutex;
  /** Holder plus waiters. The entry is dropped when this reaches zero. */
  refs: number;
}

/**
 * Table of mutexes keyed by id. Entries are created on first use and removed once nobody
 * holds or waits on them.
 */
export class KeyedMutex {
  private readonly entries = new Map<string, KeyedEntry>();

  get size(): number {
    return this.entries.size;
  }

  async lock(key: string): Promise<void> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), refs: 0 };
      this.entries.set(key, entry);
    }
    entry.refs += 1;
    await entry.mutex.lock();
  }

  unlock(key: string): void {
    const entry = this.entries.get(key);
    if (!entry || !entry.mutex.isLocked) {
      throw new LockStateError(`Lock for '${key}' is not held`);
    }
    entry.refs -= 1;
    entry.mutex.unlock();
    if (entry.refs === 0) {
      this.entries.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.entries.get(key)?.mutex.isLocked ?? false;
  }

  async withLock<T>(key: string, action: () => Promise<T> | T): Promise<T> {
    await this.lock(key);
    try {
      return await action();
    } finally {
      this.unlock(key);
    }
  }
}
