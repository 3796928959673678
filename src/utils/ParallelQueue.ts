import invariant from "tiny-invariant";

/**
 * Runs at most `maxTasks` tasks at a time, in submission order.
 * With `maxTasks = 1` it serialises tasks (used as a per-wallet send lock).
 */
export class ParallelQueue {
  #queue: Array<() => void> = [];
  activeTasks = 0;
  readonly maxTasks: number;

  constructor(maxTasks: number) {
    invariant(
      Number.isInteger(maxTasks) && maxTasks > 0,
      "maxTasks must be a positive integer"
    );
    this.maxTasks = maxTasks;
  }

  get pendingTasks(): number {
    return this.#queue.length;
  }

  runTask<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        // sync throws reject like async ones
        new Promise<T>((run) => run(task()))
          .finally(() => this.next())
          .then(resolve, reject);
      };

      if (this.activeTasks < this.maxTasks) {
        this.activeTasks++;
        start();
      } else {
        this.#queue.push(start);
      }
    });
  }

  /**
   * Run `task` for every item, bounded by `maxTasks`, preserving input order
   */
  map<I, T>(items: readonly I[], task: (item: I) => Promise<T>): Promise<T[]> {
    return Promise.all(items.map((item) => this.runTask(() => task(item))));
  }

  private next(): void {
    const nextTask = this.#queue.shift();
    if (nextTask) {
      nextTask();
    } else {
      this.activeTasks--;
    }
  }
}

/**
 * One single-slot queue per key; serialises work sharing a key.
 */
export class KeyedMutex {
  private readonly queues = new Map<string, ParallelQueue>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const normalized = key.toLowerCase();
    let queue = this.queues.get(normalized);
    if (!queue) {
      queue = new ParallelQueue(1);
      this.queues.set(normalized, queue);
    }
    return queue.runTask(task);
  }
}
