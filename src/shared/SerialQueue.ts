/**
 * 以 promise chain 串接任務，同一時間只執行一個
 * 前一個任務失敗不影響後續任務，錯誤仍回傳給各自的呼叫端
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
