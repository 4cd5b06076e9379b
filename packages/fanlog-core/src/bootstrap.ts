/**
 * 启动入口：校验配置后创建 Manager。
 * 宿主在启动时调用一次，在退出时调用一次 manager.close()。
 */

import { configFromEnv, defaultConfig, loadConfigFile, validateConfig, type LogConfig } from "./config.js";
import { LogManager, type LogManagerOptions } from "./manager.js";

/**
 * @throws ConfigError 配置无效
 * @throws LogSetupError 内置 handler 无法创建
 */
export function createManager(config: LogConfig = defaultConfig(), opts?: LogManagerOptions): LogManager {
  validateConfig(config);
  return new LogManager(config, opts);
}

/** 从环境变量创建 Manager（FANLOG_LEVEL、FANLOG_FILE_PATH 等） */
export function createManagerFromEnv(env: NodeJS.ProcessEnv = process.env, opts?: LogManagerOptions): LogManager {
  return createManager(configFromEnv(env), opts);
}

export async function createManagerFromFile(filePath: string, opts?: LogManagerOptions): Promise<LogManager> {
  return createManager(await loadConfigFile(filePath), opts);
}
