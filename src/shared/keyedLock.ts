/**
 * 进程内按 key 串行执行异步任务。不同 key 之间互不阻塞。
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  public async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      // 队尾仍是本任务时释放 key
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  public get size(): number {
    return this.tails.size;
  }
}
