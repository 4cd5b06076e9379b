/**
 * fanlog Logger - 按 context 区分的日志门面
 *
 * 级别过滤、printf 格式化、加 `[context] ` 前缀，再分发给挂载的 handler。
 * handler 的失败不会抛给调用方，而是交给 ErrorReporter。
 */

import {
  formatMessage,
  isLevelEnabled,
  type Handler,
  type HandlerType,
  type LogLevel,
} from "@fanlog/handler";
import { HandlerCloseError } from "./errors.js";
import { reportToStderr, type ErrorReporter } from "./report.js";

export interface Logger {
  /** 创建后不可变 */
  readonly context: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warning(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  fatal(message: string, ...args: unknown[]): void;
  /** 挂载一个由该 logger 持有的 handler；同类型的旧 handler 若也由它持有则被关闭 */
  addHandler(type: HandlerType, handler: Handler): void;
  /** 卸载；只有该 logger 持有的 handler 才会被关闭 */
  removeHandler(type: HandlerType): void;
  getHandler(type: HandlerType): Handler | undefined;
  setMinLevel(level: LogLevel): void;
  getMinLevel(): LogLevel;
  /** 关闭持有的 handler，卸载借用的 handler（不关闭） */
  close(): void;
}

export interface ContextLoggerOptions {
  minLevel?: LogLevel;
  onError?: ErrorReporter;
}

interface Attachment {
  handler: Handler;
  /** false 表示借用自 Manager，关闭由 Manager 负责 */
  owned: boolean;
}

export class ContextLogger implements Logger {
  private readonly attachments = new Map<HandlerType, Attachment>();
  private minLevel: LogLevel;
  private readonly onError: ErrorReporter;

  constructor(
    readonly context: string,
    opts: ContextLoggerOptions = {},
  ) {
    this.minLevel = opts.minLevel ?? "info";
    this.onError = opts.onError ?? reportToStderr;
  }

  debug(message: string, ...args: unknown[]): void {
    this.log("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log("info", message, args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.log("warning", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log("error", message, args);
  }

  fatal(message: string, ...args: unknown[]): void {
    this.log("fatal", message, args);
  }

  addHandler(type: HandlerType, handler: Handler): void {
    this.attach(type, { handler, owned: true });
  }

  removeHandler(type: HandlerType): void {
    const entry = this.attachments.get(type);
    if (!entry) return;
    this.attachments.delete(type);
    this.release(type, entry);
  }

  /** 挂载借用的共享 handler（Manager 使用） */
  share(type: HandlerType, handler: Handler): void {
    this.attach(type, { handler, owned: false });
  }

  /**
   * 卸载借用的 handler，不关闭；持有的 handler 保持不动
   * @returns 是否卸载了
   */
  unshare(type: HandlerType): boolean {
    const entry = this.attachments.get(type);
    if (!entry || entry.owned) return false;
    this.attachments.delete(type);
    return true;
  }

  getHandler(type: HandlerType): Handler | undefined {
    return this.attachments.get(type)?.handler;
  }

  handlerTypes(): HandlerType[] {
    return Array.from(this.attachments.keys());
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  close(): void {
    const entries = Array.from(this.attachments);
    this.attachments.clear();

    let first: HandlerCloseError | undefined;
    for (const [type, entry] of entries) {
      if (!entry.owned) continue;
      try {
        entry.handler.close();
      } catch (err) {
        if (!first) first = new HandlerCloseError(type, err);
      }
    }
    if (first) throw first;
  }

  private attach(type: HandlerType, next: Attachment): void {
    const previous = this.attachments.get(type);
    this.attachments.set(type, next);
    if (previous && previous.handler !== next.handler) {
      this.release(type, previous);
    }
  }

  private release(type: HandlerType, entry: Attachment): void {
    if (!entry.owned) return;
    try {
      entry.handler.close();
    } catch (err) {
      this.onError(`close handler ${type}`, err);
    }
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!isLevelEnabled(level, this.minLevel)) return;

    let text: string;
    try {
      text = formatMessage(message, args);
    } catch (err) {
      this.onError(`format message for ${this.context || "logger"}`, err);
      return;
    }
    if (this.context !== "") {
      text = `[${this.context}] ${text}`;
    }

    // 快照：分发期间的挂载/卸载不影响本次投递
    for (const [type, { handler }] of Array.from(this.attachments)) {
      try {
        handler.log(level, text);
      } catch (err) {
        this.onError(`write to handler ${type}`, err);
      }
    }
  }
}
