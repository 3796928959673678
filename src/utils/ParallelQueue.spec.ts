import { KeyedMutex, ParallelQueue } from "./ParallelQueue";
import { promiseWithResolvers } from "./promiseWithResolver";

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe("#ParallelQueue", () => {
  it("should never run more than maxTasks at once", async () => {
    const queue = new ParallelQueue(2);
    let running = 0;
    let peak = 0;

    const results = await queue.map([1, 2, 3, 4, 5], async (n) => {
      running++;
      peak = Math.max(peak, running);
      await flush();
      running--;
      return n * 10;
    });

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it("should keep going after a task fails", async () => {
    const queue = new ParallelQueue(1);

    await expect(queue.runTask(async () => Promise.reject(new Error("boom")))).rejects.toThrow(
      "boom"
    );
    await expect(queue.runTask(async () => "next")).resolves.toBe("next");
    expect(queue.pendingTasks).toBe(0);
  });

  it("should release the slot when a task throws synchronously", async () => {
    const queue = new ParallelQueue(1);
    const throwing = (): Promise<string> => {
      throw new Error("sync");
    };

    await expect(queue.runTask(throwing)).rejects.toThrow("sync");
    await expect(queue.runTask(async () => "next")).resolves.toBe("next");
    expect(queue.activeTasks).toBe(0);
  });

  it("should reject a non-positive size", () => {
    expect(() => new ParallelQueue(0)).toThrow();
  });
});

describe("#KeyedMutex", () => {
  it("should serialise tasks sharing a key, ignoring case", async () => {
    const mutex = new KeyedMutex();
    const gate = promiseWithResolvers<void>();
    const order: string[] = [];

    const first = mutex.runExclusive("0xABC", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.runExclusive("0xabc", async () => {
      order.push("second");
    });
    const other = mutex.runExclusive("0xdef", async () => {
      order.push("other");
    });

    await other;
    expect(order).toEqual(["other"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["other", "first", "second"]);
  });
});
