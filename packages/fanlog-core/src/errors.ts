import { errorMessage, type HandlerType } from "@fanlog/handler";

/**
 * 配置错误，带出错字段与取值。
 *
 * 消息格式：`log config error in field '<field>' with value '<value>': <reason>`，
 * value 为空时省略 with value 段。
 */
export class ConfigError extends Error {
  constructor(
    readonly field: string,
    readonly value: string,
    readonly reason: string,
  ) {
    super(
      value !== ""
        ? `log config error in field '${field}' with value '${value}': ${reason}`
        : `log config error in field '${field}': ${reason}`,
    );
    this.name = "ConfigError";
  }
}

/** Manager 无法建立内置 handler，调用方决定中止还是重试 */
export class LogSetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LogSetupError";
  }
}

export class ManagerClosedError extends Error {
  constructor(operation: string) {
    super(`log manager is closed: cannot ${operation}`);
    this.name = "ManagerClosedError";
  }
}

export class HandlerCloseError extends Error {
  constructor(
    readonly handlerType: HandlerType,
    cause: unknown,
  ) {
    super(`failed to close handler ${handlerType}: ${errorMessage(cause)}`, { cause });
    this.name = "HandlerCloseError";
  }
}
