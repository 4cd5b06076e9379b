/**
 * fanlog 配置
 *
 * 负责默认配置、校验，以及从 JSON 文件 / 环境变量加载。
 * 外部 JSON 格式使用 snake_case 的 `max_size`，也接受 "10MB" 这类写法。
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage, isLogLevel, LOG_LEVELS, type LogLevel } from "@fanlog/handler";
import { ConfigError } from "./errors.js";

export interface ConsoleConfig {
  enabled: boolean;
  /** 级别标签是否带 ANSI 颜色 */
  colored: boolean;
}

export interface FileConfig {
  enabled: boolean;
  /** 独立使用或作为 stack 成员时都必须设置 */
  path: string;
  /** 单文件最大字节数，超过后轮转；0 = 不限制 */
  maxSize: number;
}

export interface StackConfig {
  enabled: boolean;
  handlers: {
    console: boolean;
    file: boolean;
  };
}

export interface LogConfig {
  /** 新建 logger 的最低级别 */
  level: LogLevel;
  console: ConsoleConfig;
  file: FileConfig;
  stack: StackConfig;
}

/** 默认：info 级别，只开彩色控制台 */
export function defaultConfig(): LogConfig {
  return {
    level: "info",
    console: { enabled: true, colored: true },
    file: { enabled: false, path: "", maxSize: 0 },
    stack: { enabled: false, handlers: { console: false, file: false } },
  };
}

function invalidLevel(value: string): ConfigError {
  return new ConfigError("level", value, `invalid log level, must be one of: ${LOG_LEVELS.join(", ")}`);
}

/**
 * 校验配置，按顺序报告第一个问题
 *
 * @throws ConfigError
 */
export function validateConfig(config: LogConfig): void {
  if (!isLogLevel(config.level)) {
    throw invalidLevel(String(config.level));
  }

  if (!config.console.enabled && !config.file.enabled && !config.stack.enabled) {
    throw new ConfigError("handlers", "", "at least one handler must be enabled");
  }

  if (config.file.enabled) {
    if (config.file.path === "") {
      throw new ConfigError("file.path", "", "path is required when file handler is enabled");
    }
    if (config.file.maxSize < 0) {
      throw new ConfigError(
        "file.max_size",
        String(config.file.maxSize),
        "max_size must be non-negative (0 for unlimited)",
      );
    }
  }

  if (config.stack.enabled) {
    if (!config.stack.handlers.console && !config.stack.handlers.file) {
      throw new ConfigError("stack.handlers", "", "stack handler must have at least one sub-handler enabled");
    }
    if (config.stack.handlers.file && config.file.path === "") {
      throw new ConfigError("file.path", "", "path is required when file handler is used in stack");
    }
  }
}

/** 解析 "10MB"、"512kb"、"2048" 等为字节数；无法解析时返回 undefined */
export function parseSizeToBytes(s: string): number | undefined {
  const m = s.trim().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/i);
  if (!m) return undefined;
  const n = Number(m[1]);
  const unit = (m[2] ?? "b").toLowerCase();
  const factors: Record<string, number> = { b: 1, kb: 1024, mb: 1024 * 1024, gb: 1024 * 1024 * 1024 };
  return Math.floor(n * (factors[unit] ?? 1));
}

function sizeFromString(field: string, raw: string): number {
  const bytes = parseSizeToBytes(raw);
  if (bytes === undefined) {
    throw new ConfigError(field, raw, "invalid size, expected a byte count or a value such as 10MB");
  }
  return bytes;
}

// ============================================================================
// Zod 验证 Schema（外部 JSON 格式）
// ============================================================================

const ConsoleSchema = z.object({
  enabled: z.boolean().optional(),
  colored: z.boolean().optional(),
});

const FileSchema = z.object({
  enabled: z.boolean().optional(),
  path: z.string().optional(),
  max_size: z.union([z.number().int("max_size must be an integer"), z.string()]).optional(),
});

const StackSchema = z.object({
  enabled: z.boolean().optional(),
  handlers: z
    .object({
      console: z.boolean().optional(),
      file: z.boolean().optional(),
    })
    .optional(),
});

const LogSectionSchema = z.object({
  level: z.string().optional(),
  console: ConsoleSchema.optional(),
  file: FileSchema.optional(),
  stack: StackSchema.optional(),
});

type LogSection = z.infer<typeof LogSectionSchema>;

function hasLogKey(raw: unknown): raw is { log: unknown } {
  return typeof raw === "object" && raw !== null && "log" in raw;
}

function toConfig(section: LogSection): LogConfig {
  const d = defaultConfig();
  const level = section.level ?? d.level;
  if (!isLogLevel(level)) {
    throw invalidLevel(level);
  }

  const rawSize = section.file?.max_size;
  const maxSize = typeof rawSize === "string" ? sizeFromString("file.max_size", rawSize) : rawSize ?? d.file.maxSize;

  return {
    level,
    console: {
      enabled: section.console?.enabled ?? d.console.enabled,
      colored: section.console?.colored ?? d.console.colored,
    },
    file: {
      enabled: section.file?.enabled ?? d.file.enabled,
      path: section.file?.path ?? d.file.path,
      maxSize,
    },
    stack: {
      enabled: section.stack?.enabled ?? d.stack.enabled,
      handlers: {
        console: section.stack?.handlers?.console ?? d.stack.handlers.console,
        file: section.stack?.handlers?.file ?? d.stack.handlers.file,
      },
    },
  };
}

/**
 * 把外部 JSON 值转换为校验过的 LogConfig，未给出的字段取默认值。
 * 接受日志段本身，或带顶层 `log` 键的整份应用配置。
 *
 * @throws ConfigError
 */
export function parseConfig(raw: unknown): LogConfig {
  const section = hasLogKey(raw) ? raw.log : raw;
  const parsed = LogSectionSchema.safeParse(section ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "log";
    throw new ConfigError(field, "", issue?.message ?? "invalid log config");
  }
  const config = toConfig(parsed.data);
  validateConfig(config);
  return config;
}

export async function loadConfigFile(filePath: string): Promise<LogConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (err) {
    throw new Error(`failed to read log config ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseConfig(raw);
}

// ============================================================================
// 环境变量
// ============================================================================

const ENV_FLAGS = {
  FANLOG_CONSOLE: "console.enabled",
  FANLOG_CONSOLE_COLORED: "console.colored",
  FANLOG_FILE: "file.enabled",
  FANLOG_STACK: "stack.enabled",
  FANLOG_STACK_CONSOLE: "stack.handlers.console",
  FANLOG_STACK_FILE: "stack.handlers.file",
} as const;

type EnvFlag = keyof typeof ENV_FLAGS;

function envFlag(env: NodeJS.ProcessEnv, name: EnvFlag, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  throw new ConfigError(ENV_FLAGS[name], raw, `${name} must be true or false`);
}

/**
 * 从环境变量构建配置，未设置的键保持默认值
 *
 * @throws ConfigError
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const d = defaultConfig();
  const level = env.FANLOG_LEVEL?.trim().toLowerCase() || d.level;
  if (!isLogLevel(level)) {
    throw invalidLevel(level);
  }
  const rawSize = env.FANLOG_FILE_MAX_SIZE;

  const config: LogConfig = {
    level,
    console: {
      enabled: envFlag(env, "FANLOG_CONSOLE", d.console.enabled),
      colored: envFlag(env, "FANLOG_CONSOLE_COLORED", d.console.colored),
    },
    file: {
      enabled: envFlag(env, "FANLOG_FILE", d.file.enabled),
      path: env.FANLOG_FILE_PATH ?? d.file.path,
      maxSize: rawSize ? sizeFromString("file.max_size", rawSize) : d.file.maxSize,
    },
    stack: {
      enabled: envFlag(env, "FANLOG_STACK", d.stack.enabled),
      handlers: {
        console: envFlag(env, "FANLOG_STACK_CONSOLE", d.stack.handlers.console),
        file: envFlag(env, "FANLOG_STACK_FILE", d.stack.handlers.file),
      },
    },
  };
  validateConfig(config);
  return config;
}
