/** 占位符数量与参数数量不一致 */
export class FormatError extends Error {
  constructor(
    readonly placeholders: number,
    readonly argCount: number,
    readonly template: string,
  ) {
    super(`format "${template}" expects ${placeholders} argument(s), got ${argCount}`);
    this.name = "FormatError";
  }
}

/** FileHandler 的构造、写入、轮转、关闭失败 */
export class FileHandlerError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FileHandlerError";
  }
}

/** 取 Node fs 错误的 code（ENOENT、EACCES 等） */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

/** 权限不足：目录不可写或文件不可打开 */
export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EACCES" || code === "EPERM";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
