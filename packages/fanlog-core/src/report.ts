import { errorMessage } from "@fanlog/handler";

/** 日志系统自身的错误出口，不会回传给业务调用方 */
export type ErrorReporter = (scope: string, err: unknown) => void;

export const reportToStderr: ErrorReporter = (scope, err) => {
  process.stderr.write(`[fanlog] ${scope}: ${errorMessage(err)}\n`);
};
