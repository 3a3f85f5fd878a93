export declare namespace SyncPromiseQueue {
  export type Task = () => void;
}

/**
 * First-in, first-out list of pending promise reactions.
 *
 * A queue belongs to exactly one `SyncPromiseAdapter`. Nothing runs a queued
 * task except an explicit call to `runNext`, which is how
 * `SyncPromiseAdapter.wait` drains work without an event loop.
 */
export class SyncPromiseQueue {
  private tasks: SyncPromiseQueue.Task[] = [];
  // Index of the oldest task that has not run yet. Consumed slots are only
  // dropped once they make up half of the backing array.
  private head = 0;

  public get size() {
    return this.tasks.length - this.head;
  }

  public isEmpty() {
    return this.size === 0;
  }

  public enqueue(task: SyncPromiseQueue.Task) {
    this.tasks.push(task);
  }

  /**
   * Runs the oldest task. Returns `false` without doing anything when the
   * queue is empty.
   */
  public runNext(): boolean {
    if (this.head >= this.tasks.length) {
      return false;
    }

    const task = this.tasks[this.head];
    this.head++;

    if (this.head * 2 >= this.tasks.length) {
      this.tasks = this.tasks.slice(this.head);
      this.head = 0;
    }

    task();
    return true;
  }
}
