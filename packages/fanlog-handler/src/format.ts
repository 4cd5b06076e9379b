/**
 * fanlog handler - 格式化
 *
 * 行格式：`YYYY/MM/DD HH:MM:SS [LEVEL] message`，均为本地时间。
 */

import { FormatError } from "./errors.js";
import { levelTag, type LogLevel } from "./types.js";

/** `%[flags][width][.precision]verb`，另有 `%%` */
const PLACEHOLDER = /%%|%([-+ 0#]*)(\d+)?(?:\.(\d+))?([sdifxXoqvj])/g;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return "[object]";
    }
  }
  return String(value);
}

function toInteger(value: unknown): string {
  if (typeof value === "bigint") return value.toString();
  const n = Number(value);
  return Number.isFinite(n) ? String(Math.trunc(n)) : String(n);
}

function toRadix(value: unknown, radix: number): string {
  if (typeof value === "bigint") return value.toString(radix);
  const n = Number(value);
  return Number.isFinite(n) ? Math.trunc(n).toString(radix) : String(n);
}

function toFixed(value: unknown, precision: number): string {
  const n = Number(value);
  return Number.isFinite(n) ? n.toFixed(precision) : String(n);
}

function toJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? "undefined";
  } catch {
    return "[Circular]";
  }
}

function render(verb: string, arg: unknown, flags: string, precision: number | undefined): string {
  switch (verb) {
    case "d":
    case "i":
      return withSign(toInteger(arg), flags);
    case "f":
      return withSign(toFixed(arg, precision ?? 6), flags);
    case "x":
      return toRadix(arg, 16);
    case "X":
      return toRadix(arg, 16).toUpperCase();
    case "o":
      return toRadix(arg, 8);
    case "q":
      return JSON.stringify(stringify(arg));
    case "j":
      return toJson(arg);
    default: {
      const text = stringify(arg);
      return precision === undefined ? text : text.slice(0, precision);
    }
  }
}

function withSign(text: string, flags: string): string {
  if (text.startsWith("-")) return text;
  if (flags.includes("+")) return `+${text}`;
  if (flags.includes(" ")) return ` ${text}`;
  return text;
}

function pad(text: string, width: number, flags: string, numeric: boolean): string {
  if (text.length >= width) return text;
  if (flags.includes("-")) return text.padEnd(width, " ");
  if (numeric && flags.includes("0")) {
    const sign = /^[-+ ]/.test(text) ? text.charAt(0) : "";
    return sign + text.slice(sign.length).padStart(width - sign.length, "0");
  }
  return text.padStart(width, " ");
}

/**
 * printf 风格替换：%s %v 字符串化，%d %i 取整，%f 定点小数，%x %X %o 进制，%q 加引号，%j JSON，%% 输出 %。
 * 支持 flags（- + 空格 0）、宽度和精度，如 `%5d`、`%.2f`、`%-8s`。
 * args 为空时原样返回 message（不解析占位符）。
 *
 * @throws FormatError 占位符数量与参数数量不符
 */
export function formatMessage(message: string, args: readonly unknown[]): string {
  if (args.length === 0) return message;

  let expected = 0;
  for (const m of message.matchAll(PLACEHOLDER)) {
    if (m[0] !== "%%") expected++;
  }
  if (expected !== args.length) {
    throw new FormatError(expected, args.length, message);
  }

  let i = 0;
  return message.replace(
    PLACEHOLDER,
    (token: string, flags: string | undefined, width: string | undefined, precision: string | undefined, verb: string | undefined) => {
      if (token === "%%" || verb === undefined) return "%";
      const f = flags ?? "";
      const text = render(verb, args[i++], f, precision === undefined ? undefined : Number(precision));
      if (width === undefined) return text;
      return pad(text, Number(width), f, "difxXo".includes(verb));
    },
  );
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}/${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

/** 轮转备份文件的后缀，精确到秒 */
export function formatRotationStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function formatLine(level: LogLevel, text: string, date: Date, tag: string = `[${levelTag(level)}]`): string {
  return `${formatTimestamp(date)} ${tag} ${text}`;
}
