/**
 * Tests for errors.ts - AsyncLazy error types
 */
import { describe, it, expect } from "vitest";
import { TaggedError } from "./tagged-error";
import {
  ReentrancyError,
  CancellationError,
  FactoryError,
  SynchronousWaitError,
  isReentrancyError,
  isCancellationError,
  isFactoryError,
  isSynchronousWaitError,
  isAsyncLazyError,
  type AsyncLazyError,
} from "./errors";

describe("AsyncLazy errors", () => {
  describe("ReentrancyError", () => {
    it("names the lazy value in the message", () => {
      const error = new ReentrancyError({ lazyName: "config" });
      expect(error._tag).toBe("ReentrancyError");
      expect(error.name).toBe("ReentrancyError");
      expect(error.lazyName).toBe("config");
      expect(error.message).toBe(
        'ReentrancyError: Value factory "config" attempted to access its own value'
      );
    });

    it("omits the name when none is given", () => {
      const error = new ReentrancyError({});
      expect(error.message).toBe(
        "ReentrancyError: Value factory attempted to access its own value"
      );
    });

    it("is an Error", () => {
      const error = new ReentrancyError({});
      expect(error instanceof Error).toBe(true);
      expect(TaggedError.isTaggedError(error)).toBe(true);
    });
  });

  describe("CancellationError", () => {
    it("keeps the abort reason", () => {
      const reason = new Error("navigated away");
      const error = new CancellationError({ reason });
      expect(error._tag).toBe("CancellationError");
      expect(error.reason).toBe(reason);
      expect(error.message).toBe(
        "CancellationError: Wait for lazy value was cancelled"
      );
    });
  });

  describe("FactoryError", () => {
    it("wraps what the factory threw as its cause", () => {
      const cause = new Error("connection refused");
      const error = new FactoryError({ lazyName: "db", cause });
      expect(error._tag).toBe("FactoryError");
      expect(error.cause).toBe(cause);
      expect(error.message).toBe('FactoryError: Value factory "db" failed');
    });

    it("accepts non-Error causes", () => {
      const error = new FactoryError({ cause: "plain string" });
      expect(error.cause).toBe("plain string");
      expect(error.message).toBe("FactoryError: Value factory failed");
    });
  });

  describe("SynchronousWaitError", () => {
    it("points the caller at getValueAsync()", () => {
      expect(new SynchronousWaitError({}).message).toBe(
        "SynchronousWaitError: Value is not available synchronously; await getValueAsync()"
      );
      expect(new SynchronousWaitError({ lazyName: "cfg" }).message).toBe(
        'SynchronousWaitError: Value of "cfg" is not available synchronously; await getValueAsync()'
      );
    });
  });

  describe("type guards", () => {
    const reentrancy = new ReentrancyError({});
    const cancellation = new CancellationError({});
    const factory = new FactoryError({ cause: null });
    const syncWait = new SynchronousWaitError({});

    it("matches each error by tag", () => {
      expect(isReentrancyError(reentrancy)).toBe(true);
      expect(isReentrancyError(cancellation)).toBe(false);
      expect(isCancellationError(cancellation)).toBe(true);
      expect(isCancellationError(factory)).toBe(false);
      expect(isFactoryError(factory)).toBe(true);
      expect(isFactoryError(syncWait)).toBe(false);
      expect(isSynchronousWaitError(syncWait)).toBe(true);
      expect(isSynchronousWaitError(reentrancy)).toBe(false);
    });

    it("limits isAsyncLazyError to the getResultAsync() union", () => {
      expect(isAsyncLazyError(reentrancy)).toBe(true);
      expect(isAsyncLazyError(cancellation)).toBe(true);
      expect(isAsyncLazyError(factory)).toBe(true);
      expect(isAsyncLazyError(syncWait)).toBe(false);
    });

    it("rejects plain errors and non-errors", () => {
      expect(TaggedError.isTaggedError(new Error("x"))).toBe(false);
      expect(TaggedError.isTaggedError({ _tag: "ReentrancyError" })).toBe(false);
      expect(isReentrancyError({ _tag: "ReentrancyError" })).toBe(false);
      expect(isAsyncLazyError(undefined)).toBe(false);
    });

    it("narrows the union by _tag", () => {
      const label = (error: AsyncLazyError): string => {
        switch (error._tag) {
          case "ReentrancyError":
            return "reentrant";
          case "CancellationError":
            return "cancelled";
          case "FactoryError":
            return `failed: ${String(error.cause)}`;
        }
      };

      expect(label(reentrancy)).toBe("reentrant");
      expect(label(cancellation)).toBe("cancelled");
      expect(label(new FactoryError({ cause: "disk full" }))).toBe(
        "failed: disk full"
      );
    });
  });
});
