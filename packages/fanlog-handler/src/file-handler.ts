/**
 * fanlog handler - 文件输出
 *
 * 功能：
 * - 追加写入单个日志文件，所有 I/O 同步完成
 * - 按大小轮转：写入前若已达 maxSize，先把当前文件改名为 `<path>.<YYYYMMDDHHMMSS>`
 * - 从不创建目录，父目录必须事先存在
 */

import fs, { type Stats } from "node:fs";
import path from "node:path";
import { errorCode, errorMessage, FileHandlerError, isPermissionError } from "./errors.js";
import { formatLine, formatMessage, formatRotationStamp } from "./format.js";
import type { Handler, LogLevel } from "./types.js";

function openForAppend(filePath: string): number {
  return fs.openSync(filePath, "a", 0o644);
}

export class FileHandler implements Handler {
  readonly path: string;
  /** 0 表示不轮转 */
  readonly maxSize: number;
  private fd: number | null;
  /** 自上次打开/轮转以来写入当前文件的字节数 */
  private currentSize: number;

  constructor(filePath: string, maxSize = 0) {
    if (!filePath) {
      throw new FileHandlerError("log file path is required", filePath);
    }
    if (!Number.isInteger(maxSize) || maxSize < 0) {
      throw new FileHandlerError(`maxSize must be a non-negative integer, got ${maxSize}`, filePath);
    }

    this.path = filePath;
    this.maxSize = maxSize;
    const { fd, size } = FileHandler.open(filePath);
    this.fd = fd;
    this.currentSize = size;
  }

  private static open(filePath: string): { fd: number; size: number } {
    let stat: Stats | undefined;
    try {
      stat = fs.statSync(filePath);
    } catch (err) {
      const code = errorCode(err);
      // ENOTDIR：父路径是普通文件，交给下面的父目录检查报告
      if (code !== "ENOENT" && code !== "ENOTDIR") {
        if (isPermissionError(err)) {
          throw new FileHandlerError(`directory is not writable: ${path.dirname(filePath)}`, filePath, { cause: err });
        }
        throw new FileHandlerError(`cannot access log file path: ${errorMessage(err)}`, filePath, { cause: err });
      }
    }

    if (stat) {
      if (stat.isDirectory()) {
        throw new FileHandlerError(`log file path is a directory: ${filePath}`, filePath);
      }
      try {
        return { fd: openForAppend(filePath), size: stat.size };
      } catch (err) {
        throw new FileHandlerError(`cannot open existing log file for writing: ${errorMessage(err)}`, filePath, {
          cause: err,
        });
      }
    }

    const dir = path.dirname(filePath);
    let dirStat: Stats;
    try {
      dirStat = fs.statSync(dir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        throw new FileHandlerError(`parent directory does not exist: ${dir}`, filePath, { cause: err });
      }
      throw new FileHandlerError(`cannot access parent directory: ${errorMessage(err)}`, filePath, { cause: err });
    }
    if (!dirStat.isDirectory()) {
      throw new FileHandlerError(`parent path is not a directory: ${dir}`, filePath);
    }

    try {
      return { fd: openForAppend(filePath), size: 0 };
    } catch (err) {
      if (isPermissionError(err)) {
        throw new FileHandlerError(`directory is not writable: ${dir}`, filePath, { cause: err });
      }
      throw new FileHandlerError(`cannot create log file: ${errorMessage(err)}`, filePath, { cause: err });
    }
  }

  /** 当前文件已写入的字节数 */
  get size(): number {
    return this.currentSize;
  }

  get closed(): boolean {
    return this.fd === null;
  }

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    const line = formatLine(level, formatMessage(message, args), new Date()) + "\n";

    let fd = this.fd;
    if (fd === null) {
      throw new FileHandlerError(`log file is closed: ${this.path}`, this.path);
    }
    if (this.maxSize > 0 && this.currentSize >= this.maxSize) {
      fd = this.rotate(fd);
    }

    let written: number;
    try {
      written = fs.writeSync(fd, line);
    } catch (err) {
      throw new FileHandlerError(`failed to write log file: ${errorMessage(err)}`, this.path, { cause: err });
    }
    this.currentSize += written;
  }

  /**
   * 同一秒内多次轮转会得到同名备份，后一次覆盖前一次。
   * 任何一步失败都直接抛出，handler 可能因此不可用。
   */
  private rotate(fd: number): number {
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (err) {
      throw new FileHandlerError(`failed to close current log file: ${errorMessage(err)}`, this.path, { cause: err });
    }

    const backupPath = `${this.path}.${formatRotationStamp(new Date())}`;
    try {
      fs.renameSync(this.path, backupPath);
    } catch (err) {
      throw new FileHandlerError(`failed to rename log file to ${backupPath}: ${errorMessage(err)}`, this.path, {
        cause: err,
      });
    }

    let next: number;
    try {
      next = openForAppend(this.path);
    } catch (err) {
      throw new FileHandlerError(`failed to open new log file: ${errorMessage(err)}`, this.path, { cause: err });
    }
    this.fd = next;
    this.currentSize = 0;
    return next;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (err) {
      throw new FileHandlerError(`failed to close log file: ${errorMessage(err)}`, this.path, { cause: err });
    }
  }
}
