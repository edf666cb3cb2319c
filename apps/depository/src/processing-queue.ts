/**
 * Processing queue — one writer at a time, readers between writes.
 *
 * exclusive() tasks run alone, in arrival order. shared() tasks run
 * concurrently with each other, but never alongside an exclusive task and
 * never ahead of one queued before them. A deposit suspended on its quote
 * transfer therefore blocks every later request until it commits or rolls
 * back.
 */

type TaskKind = "exclusive" | "shared";

interface QueuedTask {
  kind: TaskKind;
  run: () => Promise<void>;
}

export class ProcessingQueue {
  private readonly queue: QueuedTask[] = [];
  private writing = false;
  private readers = 0;

  /** Run a mutating task with the queue to itself. */
  exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.enqueue("exclusive", fn);
  }

  /** Run a read-only task alongside other readers. */
  shared<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.enqueue("shared", fn);
  }

  /** Tasks waiting to start. */
  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.writing || this.readers > 0;
  }

  private enqueue<T>(kind: TaskKind, fn: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        kind,
        run: async () => {
          try {
            resolve(await fn());
          } catch (err) {
            reject(err);
          }
        },
      });
      this.drain();
    });
  }

  private drain(): void {
    for (;;) {
      const next = this.queue[0];
      if (!next) return;

      if (next.kind === "exclusive") {
        if (this.busy) return;
        this.queue.shift();
        this.writing = true;
        void next.run().finally(() => {
          this.writing = false;
          this.drain();
        });
        // Nothing else starts until the writer finishes.
        return;
      }

      if (this.writing) return;
      this.queue.shift();
      this.readers++;
      void next.run().finally(() => {
        this.readers--;
        this.drain();
      });
    }
  }
}
