/**
 * @keyshare-gate/auth - Maintenance status
 *
 * Shared, externally owned flag telling other request handlers that a bulk
 * operation is running. Writes are serialized; the last writer wins.
 */

class UpdateLock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `update` after every previously queued update has finished
   */
  run(update: () => void): Promise<void> {
    const next = this.tail.then(update);
    // A failed update must not wedge the queue for later writers
    this.tail = next.catch(() => undefined);
    return next;
  }
}

export class MaintenanceStatus {
  private message = '';
  private readonly lock = new UpdateLock();

  set(message: string): Promise<void> {
    return this.lock.run(() => {
      this.message = message;
    });
  }

  clear(): Promise<void> {
    return this.set('');
  }

  current(): string {
    return this.message;
  }

  isUnderMaintenance(): boolean {
    return this.message.length > 0;
  }

  /**
   * Hold the status for the duration of `work`; always cleared afterwards.
   * The lock only covers the two updates, never the work itself.
   */
  async during<T>(message: string, work: () => Promise<T>): Promise<T> {
    await this.set(message);
    try {
      return await work();
    } finally {
      await this.clear();
    }
  }
}
