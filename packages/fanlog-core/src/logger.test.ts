import { describe, it, expect, vi } from "vitest";
import type { Handler, LogLevel } from "@fanlog/handler";
import { HandlerCloseError } from "./errors.js";
import { ContextLogger } from "./logger.js";

class RecordingHandler implements Handler {
  readonly calls: Array<{ level: LogLevel; message: string; args: unknown[] }> = [];
  closeCount = 0;
  onLog?: () => void;

  constructor(private readonly failing = false) {}

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    this.calls.push({ level, message, args });
    this.onLog?.();
    if (this.failing) throw new Error("sink unavailable");
  }

  close(): void {
    this.closeCount++;
    if (this.failing) throw new Error("close refused");
  }
}

describe("ContextLogger", () => {
  it("should default to info and keep its context", () => {
    const logger = new ContextLogger("UserService");
    expect(logger.context).toBe("UserService");
    expect(logger.getMinLevel()).toBe("info");
  });

  it("should skip messages below the minimum level", () => {
    const h = new RecordingHandler();
    const logger = new ContextLogger("svc", { minLevel: "warning" });
    logger.addHandler("rec", h);

    logger.debug("d");
    logger.info("i");
    expect(h.calls).toHaveLength(0);

    logger.warning("w");
    logger.error("e");
    logger.fatal("f");
    expect(h.calls.map((c) => c.level)).toEqual(["warning", "error", "fatal"]);
  });

  it("should format, prefix the context and pass no args on", () => {
    const h = new RecordingHandler();
    const logger = new ContextLogger("svc");
    logger.addHandler("rec", h);

    logger.info("user %s logged in %d times", "ann", 3);

    expect(h.calls).toEqual([{ level: "info", message: "[svc] user ann logged in 3 times", args: [] }]);
  });

  it("should deliver printf verbs with precision and radix", () => {
    const onError = vi.fn();
    const h = new RecordingHandler();
    const logger = new ContextLogger("svc", { onError });
    logger.addHandler("rec", h);

    logger.info("took %.2f ms (%x)", 1.5, 255);

    expect(onError).not.toHaveBeenCalled();
    expect(h.calls[0]?.message).toBe("[svc] took 1.50 ms (ff)");
  });

  it("should not prefix an empty context", () => {
    const h = new RecordingHandler();
    const logger = new ContextLogger("");
    logger.addHandler("rec", h);

    logger.info("bare");

    expect(h.calls[0]?.message).toBe("bare");
  });

  it("should deliver exactly once to every attached handler", () => {
    const a = new RecordingHandler();
    const b = new RecordingHandler();
    const logger = new ContextLogger("svc");
    logger.addHandler("a", a);
    logger.share("b", b);

    logger.error("once");

    expect(a.calls).toHaveLength(1);
    expect(b.calls).toHaveLength(1);
  });

  it("should report a placeholder mismatch and deliver nothing", () => {
    const onError = vi.fn();
    const h = new RecordingHandler();
    const logger = new ContextLogger("svc", { onError });
    logger.addHandler("rec", h);

    logger.info("%s and %s", "one");

    expect(h.calls).toHaveLength(0);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBe("format message for svc");
  });

  it("should report a handler failure and keep going", () => {
    const onError = vi.fn();
    const broken = new RecordingHandler(true);
    const healthy = new RecordingHandler();
    const logger = new ContextLogger("svc", { onError });
    logger.addHandler("broken", broken);
    logger.addHandler("healthy", healthy);

    expect(() => logger.info("still works")).not.toThrow();

    expect(healthy.calls).toHaveLength(1);
    expect(onError).toHaveBeenCalledWith("write to handler broken", expect.any(Error));
  });

  it("should report to stderr by default", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = new ContextLogger("svc");
    logger.addHandler("broken", new RecordingHandler(true));

    logger.info("x");

    expect(write).toHaveBeenCalledWith("[fanlog] write to handler broken: sink unavailable\n");
    write.mockRestore();
  });

  it("should close an owned handler it replaces or removes", () => {
    const first = new RecordingHandler();
    const second = new RecordingHandler();
    const logger = new ContextLogger("svc");

    logger.addHandler("rec", first);
    logger.addHandler("rec", second);
    expect(first.closeCount).toBe(1);
    expect(logger.getHandler("rec")).toBe(second);

    logger.removeHandler("rec");
    expect(second.closeCount).toBe(1);
    expect(logger.getHandler("rec")).toBeUndefined();
  });

  it("should never close a borrowed handler", () => {
    const shared = new RecordingHandler();
    const logger = new ContextLogger("svc");

    logger.share("console", shared);
    logger.share("console", new RecordingHandler());
    logger.share("console", shared);
    logger.removeHandler("console");
    logger.share("console", shared);
    logger.close();

    expect(shared.closeCount).toBe(0);
    expect(logger.getHandler("console")).toBeUndefined();
  });

  it("should only unshare borrowed handlers", () => {
    const owned = new RecordingHandler();
    const logger = new ContextLogger("svc");
    logger.addHandler("file", owned);

    expect(logger.unshare("file")).toBe(false);
    expect(logger.getHandler("file")).toBe(owned);

    logger.share("stack", new RecordingHandler());
    expect(logger.unshare("stack")).toBe(true);
    expect(logger.handlerTypes()).toEqual(["file"]);
  });

  it("should close owned handlers, detach all, and throw the first failure", () => {
    const broken = new RecordingHandler(true);
    const fine = new RecordingHandler();
    const logger = new ContextLogger("svc");
    logger.addHandler("broken", broken);
    logger.addHandler("fine", fine);

    expect(() => logger.close()).toThrow(HandlerCloseError);
    expect(broken.closeCount).toBe(1);
    expect(fine.closeCount).toBe(1);
    expect(logger.handlerTypes()).toEqual([]);
  });

  it("should not deliver to handlers attached during a dispatch", () => {
    const first = new RecordingHandler();
    const late = new RecordingHandler();
    const logger = new ContextLogger("svc");
    logger.addHandler("first", first);
    first.onLog = () => logger.share("late", late);

    logger.info("one");
    expect(late.calls).toHaveLength(0);

    first.onLog = undefined;
    logger.info("two");
    expect(late.calls).toHaveLength(1);
  });

  it("should apply a new minimum level", () => {
    const h = new RecordingHandler();
    const logger = new ContextLogger("svc");
    logger.addHandler("rec", h);

    logger.setMinLevel("debug");
    logger.debug("now visible");

    expect(logger.getMinLevel()).toBe("debug");
    expect(h.calls).toHaveLength(1);
  });
});
