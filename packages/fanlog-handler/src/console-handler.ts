/**
 * fanlog handler - 控制台输出
 *
 * 支持彩色级别标签，便于开发调试时快速区分日志级别。
 */

import { formatLine, formatMessage } from "./format.js";
import { levelTag, type Handler, type LogLevel } from "./types.js";

/** ANSI 颜色码 */
const COLORS = {
  reset: "\x1b[0m",
  boldRed: "\x1b[1;31m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  gray: "\x1b[90m",
} as const;

function colorize(level: LogLevel, text: string): string {
  switch (level) {
    case "fatal":
      return `${COLORS.boldRed}${text}${COLORS.reset}`;
    case "error":
      return `${COLORS.red}${text}${COLORS.reset}`;
    case "warning":
      return `${COLORS.yellow}${text}${COLORS.reset}`;
    case "debug":
      return `${COLORS.gray}${text}${COLORS.reset}`;
    default:
      return text;
  }
}

/** 只需要 write 的输出目标，默认 process.stdout */
export interface LineSink {
  write(chunk: string): unknown;
}

export interface ConsoleHandlerOptions {
  colored?: boolean;
  stream?: LineSink;
}

export class ConsoleHandler implements Handler {
  readonly colored: boolean;
  private readonly stream: LineSink;

  constructor(opts: ConsoleHandlerOptions = {}) {
    this.colored = opts.colored ?? false;
    this.stream = opts.stream ?? process.stdout;
  }

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    const text = formatMessage(message, args);
    const tag = `[${levelTag(level)}]`;
    const line = formatLine(level, text, new Date(), this.colored ? colorize(level, tag) : tag);
    this.stream.write(line + "\n");
  }

  /** stdout 不归 handler 所有，无需关闭 */
  close(): void {}
}
