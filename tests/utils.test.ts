import { describe, it } from "node:test";
import assert from "node:assert";
import {
  createDeferred,
  errorMessage,
  isNonEmptyString,
  isRecord,
  KeyedLock,
  TimeoutError,
  withTimeout,
} from "../src/utils.js";
import { sleep } from "./helpers/fakes.js";

describe("utils", () => {
  describe("type guards", () => {
    it("recognizes plain objects only", () => {
      assert.strictEqual(isRecord({ a: 1 }), true);
      assert.strictEqual(isRecord([]), false);
      assert.strictEqual(isRecord(null), false);
      assert.strictEqual(isRecord("x"), false);
    });

    it("rejects blank strings", () => {
      assert.strictEqual(isNonEmptyString("pixel"), true);
      assert.strictEqual(isNonEmptyString("   "), false);
      assert.strictEqual(isNonEmptyString(3), false);
    });

    it("renders thrown values", () => {
      assert.strictEqual(errorMessage(new Error("boom")), "boom");
      assert.strictEqual(errorMessage("plain"), "plain");
    });
  });

  describe("withTimeout", () => {
    it("resolves with the value when in time", async () => {
      assert.strictEqual(await withTimeout(Promise.resolve(7), 100, "op"), 7);
    });

    it("rejects with TimeoutError when the budget runs out", async () => {
      const never = new Promise<number>(() => {});
      await assert.rejects(withTimeout(never, 10, "scan"), (err: unknown) => {
        assert.ok(err instanceof TimeoutError);
        assert.strictEqual(err.timeoutMs, 10);
        assert.strictEqual(err.message, "scan timed out after 10ms");
        return true;
      });
    });

    it("passes other rejections through", async () => {
      await assert.rejects(withTimeout(Promise.reject(new Error("nope")), 100, "op"), /nope/);
    });

    it("does not bound the promise without a budget", async () => {
      const slow = sleep(20).then(() => "done");
      assert.strictEqual(await withTimeout(slow, undefined, "op"), "done");
    });
  });

  describe("createDeferred", () => {
    it("keeps the first value", async () => {
      const deferred = createDeferred<string>();
      assert.strictEqual(deferred.settled, false);
      deferred.resolve("first");
      deferred.resolve("second");
      assert.strictEqual(deferred.settled, true);
      assert.strictEqual(await deferred.promise, "first");
    });
  });

  describe("KeyedLock", () => {
    it("serializes work on the same key", async () => {
      const lock = new KeyedLock();
      const order: string[] = [];

      await Promise.all([
        lock.withLock("k", async () => {
          order.push("a:start");
          await sleep(15);
          order.push("a:end");
        }),
        lock.withLock("k", async () => {
          order.push("b:start");
          order.push("b:end");
        }),
      ]);

      assert.deepStrictEqual(order, ["a:start", "a:end", "b:start", "b:end"]);
    });

    it("releases the key after a failure", async () => {
      const lock = new KeyedLock();
      await assert.rejects(
        lock.withLock("k", async () => {
          throw new Error("fail");
        }),
        /fail/
      );
      assert.strictEqual(await lock.withLock("k", async () => "next"), "next");
    });
  });
});
