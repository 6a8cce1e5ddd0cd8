import { StoreClosedError, TransientStoreError } from './resilient-store.errors';
import type { StoreConnection } from './store-connection';

/**
 * Holds the single live connection of a store. Readers only ever see a
 * complete connection: the reference is swapped in one assignment.
 */
export class ConnectionSlot {
  private connection: StoreConnection | null = null;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @throws StoreClosedError after close()
   * @throws TransientStoreError when no connection has been established yet
   */
  current(): StoreConnection {
    if (this.closed) {
      throw new StoreClosedError();
    }
    if (!this.connection) {
      throw new TransientStoreError('No live store connection');
    }
    return this.connection;
  }

  peek(): StoreConnection | null {
    return this.connection;
  }

  /** @returns the connection that was replaced */
  replace(next: StoreConnection): StoreConnection | null {
    if (this.closed) {
      throw new StoreClosedError();
    }
    const previous = this.connection;
    this.connection = next;
    return previous;
  }

  /** Mark the slot closed and hand back the connection to release */
  close(): StoreConnection | null {
    this.closed = true;
    const previous = this.connection;
    this.connection = null;
    return previous;
  }
}
