/**
 * fanlog handler 模块
 *
 * 日志输出目标：
 * - 控制台（可选彩色级别标签）
 * - 文件（按大小轮转为带时间戳的备份）
 * - 组合（一次调用分发给多个 handler）
 */

export {
  HandlerTypes,
  isLevelEnabled,
  isLogLevel,
  levelTag,
  LOG_LEVEL_WEIGHT,
  LOG_LEVELS,
  type Handler,
  type HandlerType,
  type LogLevel,
} from "./types.js";
export { FileHandlerError, FormatError, errorMessage } from "./errors.js";
export { formatLine, formatMessage, formatRotationStamp, formatTimestamp } from "./format.js";
export { ConsoleHandler, type ConsoleHandlerOptions, type LineSink } from "./console-handler.js";
export { FileHandler } from "./file-handler.js";
export { StackHandler, type StackHandlerOptions } from "./stack-handler.js";
