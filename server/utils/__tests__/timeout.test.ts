import { describe, it, expect, vi } from "vitest";
import { runWithTimeout, scopedSignal } from "../timeout";
import { CallTimeoutError, QueryAbortedError } from "../../routing/errors";

describe("runWithTimeout", () => {
  it("resolves with the call's value", async () => {
    await expect(runWithTimeout("embed", 1000, undefined, async () => 42)).resolves.toBe(42);
  });

  it("rejects with CallTimeoutError when the call outlives its budget", async () => {
    const seen: AbortSignal[] = [];
    const call = (signal: AbortSignal) => {
      seen.push(signal);
      return new Promise<number>(() => {});
    };

    const error = await runWithTimeout("page_fetch", 15, undefined, call).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CallTimeoutError);
    expect(error).toMatchObject({ callName: "page_fetch", timeoutMs: 15, category: "timeout" });
    expect(seen[0]?.aborted).toBe(true);
  });

  it("passes other errors through", async () => {
    await expect(
      runWithTimeout("search", 1000, undefined, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
  });

  it("does not start the call when the parent already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const call = vi.fn(async () => "never");

    await expect(runWithTimeout("synthesis", 1000, controller.signal, call)).rejects.toBeInstanceOf(QueryAbortedError);
    expect(call).not.toHaveBeenCalled();
  });

  it("rejects with QueryAbortedError when the parent aborts mid-call", async () => {
    const controller = new AbortController();
    const pending = runWithTimeout("synthesis", 1000, controller.signal, () => new Promise<string>(() => {}));

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(QueryAbortedError);
  });
});

describe("scopedSignal", () => {
  it("follows the parent and stops listening once disposed", () => {
    const parent = new AbortController();
    const scoped = scopedSignal(parent.signal, 1000, "x");
    scoped.dispose();

    parent.abort();

    expect(scoped.signal.aborted).toBe(false);
    expect(scoped.didTimeOut()).toBe(false);
  });
});
