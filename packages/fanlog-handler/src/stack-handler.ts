/**
 * fanlog handler - 组合输出
 *
 * 把一次 log 调用按插入顺序分发给所有子 handler；某个子 handler 失败不影响其余的，
 * 全部分发完后抛出第一个错误。
 */

import type { Handler, LogLevel } from "./types.js";

export interface StackHandlerOptions {
  /** close() 时是否关闭子 handler。子 handler 由别处持有时设为 false */
  closeChildren?: boolean;
}

export class StackHandler implements Handler {
  private members: Handler[];
  private readonly closeChildren: boolean;

  constructor(handlers: Handler[] = [], opts: StackHandlerOptions = {}) {
    this.members = [...handlers];
    this.closeChildren = opts.closeChildren ?? true;
  }

  /** 追加到末尾，不去重 */
  addHandler(handler: Handler): void {
    this.members.push(handler);
  }

  /**
   * 移除该实例的所有出现
   * @returns 是否有成员被移除
   */
  removeHandler(handler: Handler): boolean {
    const before = this.members.length;
    this.members = this.members.filter((h) => h !== handler);
    return this.members.length !== before;
  }

  /** 原位替换，保持分发顺序 */
  replaceHandler(previous: Handler, next: Handler): boolean {
    let replaced = false;
    this.members = this.members.map((h) => {
      if (h !== previous) return h;
      replaced = true;
      return next;
    });
    return replaced;
  }

  get handlers(): readonly Handler[] {
    return [...this.members];
  }

  has(handler: Handler): boolean {
    return this.members.includes(handler);
  }

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    const failures: unknown[] = [];
    for (const h of [...this.members]) {
      try {
        h.log(level, message, ...args);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) throw failures[0];
  }

  close(): void {
    if (!this.closeChildren) return;
    const failures: unknown[] = [];
    for (const h of [...this.members]) {
      try {
        h.close();
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) throw failures[0];
  }
}
