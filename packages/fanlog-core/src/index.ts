/**
 * fanlog core 模块
 *
 * - 共享 handler 注册表与按 context 缓存的 logger
 * - 防重复挂载：同一 handler 不会既单独挂载又在 stack 中
 * - 配置校验，支持 JSON 文件与环境变量
 */

export { createManager, createManagerFromEnv, createManagerFromFile } from "./bootstrap.js";
export {
  configFromEnv,
  defaultConfig,
  loadConfigFile,
  parseConfig,
  parseSizeToBytes,
  validateConfig,
  type ConsoleConfig,
  type FileConfig,
  type LogConfig,
  type StackConfig,
} from "./config.js";
export { ConfigError, HandlerCloseError, LogSetupError, ManagerClosedError } from "./errors.js";
export { ContextLogger, type ContextLoggerOptions, type Logger } from "./logger.js";
export { LogManager, type LogManagerOptions, type Manager } from "./manager.js";
export { reportToStderr, type ErrorReporter } from "./report.js";
