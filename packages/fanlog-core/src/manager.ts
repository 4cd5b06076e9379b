/**
 * fanlog Manager - 共享 handler 注册表 + logger 缓存
 *
 * 每种 HandlerType 只有一个实例，由 Manager 持有并负责关闭；
 * logger 只借用引用。GetLogger 按配置挂载 handler，保证同一类 handler
 * 不会既单独挂载又出现在 stack 中（否则每条日志输出两次）。
 *
 * @example
 * ```typescript
 * const manager = new LogManager(config);
 * const log = manager.getLogger("UserService");
 * log.info("user %s signed in", userId);
 * // ...
 * manager.close();
 * ```
 */

import {
  ConsoleHandler,
  errorMessage,
  FileHandler,
  HandlerTypes,
  StackHandler,
  type Handler,
  type HandlerType,
  type LineSink,
  type LogLevel,
} from "@fanlog/handler";
import type { LogConfig } from "./config.js";
import { HandlerCloseError, LogSetupError, ManagerClosedError } from "./errors.js";
import { ContextLogger, type Logger } from "./logger.js";
import { reportToStderr, type ErrorReporter } from "./report.js";

export interface Manager {
  /** 注册或替换共享 handler，旧实例被关闭，新引用同步到已有 logger */
  addHandler(type: HandlerType, handler: Handler): void;
  /** 注销并关闭共享 handler，同时从所有 logger 上卸载 */
  removeHandler(type: HandlerType): void;
  getHandler(type: HandlerType): Handler | undefined;
  /** 把已注册的 handler 挂到某个已存在的 logger 上 */
  setHandler(loggerContext: string, type: HandlerType): boolean;
  /** getOrCreate：同一 context 始终返回同一实例 */
  getLogger(context: string): Logger;
  setMinLevel(level: LogLevel): void;
  close(): void;
}

export interface LogManagerOptions {
  /** 替换/注销时关闭失败、logger 写入失败的去处，默认写 stderr */
  onError?: ErrorReporter;
  /** 内置 console handler 的输出目标，默认 process.stdout */
  stdout?: LineSink;
}

/** GetLogger 挂载内置 handler 的顺序 */
const WIRING_ORDER: readonly HandlerType[] = [HandlerTypes.stack, HandlerTypes.console, HandlerTypes.file];

export class LogManager implements Manager {
  private readonly config: LogConfig;
  private readonly handlers = new Map<HandlerType, Handler>();
  private readonly loggers = new Map<string, ContextLogger>();
  /** 通过 addHandler 显式注册的类型，不受配置里 enabled 开关限制 */
  private readonly registered = new Set<HandlerType>();
  private readonly onError: ErrorReporter;
  /** 内置 stack，成员为注册表中的 console/file；被替换或注销后为 undefined */
  private builtinStack: StackHandler | undefined;
  private level: LogLevel;
  private closed = false;

  /**
   * @throws LogSetupError 缺少配置，或文件 handler 无法创建
   */
  constructor(config: LogConfig, opts: LogManagerOptions = {}) {
    if (!config) {
      throw new LogSetupError("log config is required");
    }
    this.config = config;
    this.level = config.level;
    this.onError = opts.onError ?? reportToStderr;
    this.builtinStack = this.initializeHandlers(opts.stdout);
  }

  private initializeHandlers(stdout: LineSink | undefined): StackHandler {
    const { console: consoleConfig, file, stack } = this.config;

    const consoleHandler = new ConsoleHandler({ colored: consoleConfig.colored, stream: stdout });
    this.handlers.set(HandlerTypes.console, consoleHandler);

    let fileHandler: FileHandler | undefined;
    if (file.path !== "") {
      try {
        fileHandler = new FileHandler(file.path, file.maxSize);
      } catch (err) {
        throw new LogSetupError(`failed to create file handler: ${errorMessage(err)}`, { cause: err });
      }
      this.handlers.set(HandlerTypes.file, fileHandler);
    } else if (file.enabled || (stack.enabled && stack.handlers.file)) {
      throw new LogSetupError("file.path is required when the file handler is used");
    }

    const members: Handler[] = [];
    if (stack.handlers.console) members.push(consoleHandler);
    if (stack.handlers.file && fileHandler) members.push(fileHandler);
    // 成员归注册表所有，stack 关闭时不再关闭它们
    const stackHandler = new StackHandler(members, { closeChildren: false });
    this.handlers.set(HandlerTypes.stack, stackHandler);
    return stackHandler;
  }

  /**
   * 防重复挂载：stack 启用且已包含 console/file 时，不再单独挂载它们。
   * 自定义类型挂到所有 logger。
   */
  private isWired(type: HandlerType): boolean {
    const { console: consoleConfig, file, stack } = this.config;
    switch (type) {
      case HandlerTypes.stack:
        return stack.enabled;
      case HandlerTypes.console:
        return consoleConfig.enabled && (!stack.enabled || !stack.handlers.console);
      case HandlerTypes.file:
        return file.enabled && (!stack.enabled || !stack.handlers.file);
      default:
        return true;
    }
  }

  private isStackMemberType(type: HandlerType): boolean {
    return (
      (type === HandlerTypes.console && this.config.stack.handlers.console) ||
      (type === HandlerTypes.file && this.config.stack.handlers.file)
    );
  }

  /** 该类型的输出已经经由内置 stack 到达 logger */
  private isCoveredByStack(type: HandlerType): boolean {
    return this.config.stack.enabled && this.builtinStack !== undefined && this.isStackMemberType(type);
  }

  private shouldAttach(type: HandlerType): boolean {
    if (this.isWired(type)) return true;
    return this.registered.has(type) && !this.isCoveredByStack(type);
  }

  /** 同一实例可能注册在多个类型下 */
  private isRegistered(handler: Handler): boolean {
    for (const h of this.handlers.values()) {
      if (h === handler) return true;
    }
    return false;
  }

  addHandler(type: HandlerType, handler: Handler): void {
    if (this.closed) {
      throw new ManagerClosedError(`add handler ${type}`);
    }
    const previous = this.handlers.get(type);
    if (previous === handler) return;

    this.handlers.set(type, handler);
    this.registered.add(type);

    if (type === HandlerTypes.stack) {
      this.builtinStack = undefined;
    } else if (this.builtinStack) {
      if (previous) {
        this.builtinStack.replaceHandler(previous, handler);
      } else if (this.isStackMemberType(type)) {
        this.builtinStack.addHandler(handler);
      }
    }

    for (const logger of this.loggers.values()) {
      const attached = logger.getHandler(type);
      if (this.shouldAttach(type) || (previous !== undefined && attached === previous)) {
        logger.share(type, handler);
      }
    }

    if (previous && !this.isRegistered(previous)) {
      try {
        previous.close();
      } catch (err) {
        this.onError(`close replaced handler ${type}`, err);
      }
    }
  }

  removeHandler(type: HandlerType): void {
    const handler = this.handlers.get(type);
    if (!handler) return;
    this.handlers.delete(type);
    this.registered.delete(type);

    if (handler === this.builtinStack) {
      this.builtinStack = undefined;
    } else {
      this.builtinStack?.removeHandler(handler);
    }

    for (const logger of this.loggers.values()) {
      if (logger.getHandler(type) === handler) {
        logger.unshare(type);
      }
    }

    // 仍以其他类型注册的实例继续服务，不关闭
    if (this.isRegistered(handler)) return;
    try {
      handler.close();
    } catch (err) {
      this.onError(`close removed handler ${type}`, err);
    }
  }

  getHandler(type: HandlerType): Handler | undefined {
    return this.handlers.get(type);
  }

  setHandler(loggerContext: string, type: HandlerType): boolean {
    const logger = this.loggers.get(loggerContext);
    const handler = this.handlers.get(type);
    if (!logger || !handler) return false;
    logger.share(type, handler);
    return true;
  }

  getLogger(context: string): Logger {
    const cached = this.loggers.get(context);
    if (cached) return cached;

    const logger = new ContextLogger(context, { minLevel: this.level, onError: this.onError });

    const custom = Array.from(this.handlers.keys()).filter((t) => !WIRING_ORDER.includes(t));
    for (const type of [...WIRING_ORDER, ...custom]) {
      const handler = this.handlers.get(type);
      if (handler && this.shouldAttach(type)) {
        logger.share(type, handler);
      }
    }

    this.loggers.set(context, logger);
    return logger;
  }

  /** 作用于已缓存的 logger 和之后新建的 logger */
  setMinLevel(level: LogLevel): void {
    this.level = level;
    for (const logger of this.loggers.values()) {
      logger.setMinLevel(level);
    }
  }

  /** 已创建 logger 的 context 列表 */
  contexts(): string[] {
    return Array.from(this.loggers.keys());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * 先取快照并清空注册表，再逐个实例关闭（同一实例只关一次），失败不中断；抛出第一个错误。
   * 已缓存的 logger 会卸载这些引用，之后的日志不再投递。
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const entries = Array.from(this.handlers);
    this.handlers.clear();
    this.registered.clear();
    this.builtinStack = undefined;

    for (const logger of this.loggers.values()) {
      for (const [type, handler] of entries) {
        if (logger.getHandler(type) === handler) {
          logger.unshare(type);
        }
      }
    }

    let first: HandlerCloseError | undefined;
    const done = new Set<Handler>();
    for (const [type, handler] of entries) {
      if (done.has(handler)) continue;
      done.add(handler);
      try {
        handler.close();
      } catch (err) {
        if (!first) first = new HandlerCloseError(type, err);
      }
    }
    if (first) throw first;
  }
}
