/**
 * fanlog handler - 类型定义
 *
 * 五个级别 debug/info/warning/error/fatal，handler 同步输出，失败直接抛出。
 */

export type LogLevel = "debug" | "info" | "warning" | "error" | "fatal";

/** 日志级别权重，用于比较 */
export const LOG_LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  fatal: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warning", "error", "fatal"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVEL_WEIGHT, value);
}

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_WEIGHT[level] >= LOG_LEVEL_WEIGHT[minLevel];
}

/** 行内的级别标签，如 WARNING */
export function levelTag(level: LogLevel): string {
  return level.toUpperCase();
}

/**
 * Handler 接口：一个日志输出目标。
 *
 * 被多个 logger 共享时 `log` 会被反复调用；`close` 每个实例只应调用一次。
 */
export interface Handler {
  /** args 非空时按 printf 风格替换 message 中的占位符 */
  log(level: LogLevel, message: string, ...args: unknown[]): void;
  close(): void;
}

/** 注册表的 key，内置 console/file/stack，也可以是任意自定义字符串 */
export type HandlerType = "console" | "file" | "stack" | (string & {});

export const HandlerTypes = {
  console: "console",
  file: "file",
  stack: "stack",
} as const;
