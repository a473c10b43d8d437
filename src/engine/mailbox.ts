/**
 * 单写者邮箱：同一船员的所有命令排成一条 promise 链，依次执行。
 * 某个命令失败只影响它自己的调用方，不会打断后续命令。
 */
export class Mailbox {
  private tail: Promise<unknown> = Promise.resolve();
  private pending_ = 0;

  get pending(): number {
    return this.pending_;
  }

  enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending_ += 1;
    const run = this.tail.then(task).finally(() => {
      this.pending_ -= 1;
    });
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** 等到此刻之前入队的命令全部完成 */
  idle(): Promise<void> {
    return this.tail.then(() => undefined);
  }
}
