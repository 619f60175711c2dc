/**
 * Tests for transfer.ts - callback-style GET
 */
import { describe, it, expect, vi } from "vitest";
import { unwrap } from "./result";
import { AsyncScheduler, type SchedulerEvent } from "./scheduler";
import { createMockEngine, expectErr, expectOk, text, type MockEngineOptions } from "./testing";
import { getAsync, type GetCallback, type GetResult } from "./transfer";

function setup(options: MockEngineOptions) {
  const engine = createMockEngine(options);
  const events: SchedulerEvent[] = [];
  const scheduler = unwrap(
    AsyncScheduler.create(engine, { clock: () => 0, onEvent: (e) => events.push(e) })
  );
  return { engine, scheduler, events };
}

describe("getAsync()", () => {
  it("delivers the body after one tick and unregisters the transfer", () => {
    const { engine, scheduler } = setup({ routes: { "http://x/file1.txt": { body: "hello" } } });
    const userData = { name: "state" };
    const onComplete = vi.fn<GetCallback<typeof userData>>();

    const handle = getAsync(scheduler, "http://x/file1.txt", userData, onComplete);
    expect(onComplete).not.toHaveBeenCalled();

    scheduler.tick();

    expect(onComplete).toHaveBeenCalledTimes(1);
    const [passed, result] = onComplete.mock.calls[0];
    expect(passed).toBe(userData);
    expectOk(result);
    expect(text(result.value)).toBe("hello");
    expect(scheduler.isPending(handle)).toBe(false);
    expect(engine.liveTransfers).toBe(0);
  });

  it("concatenates every chunk in arrival order", () => {
    const { scheduler } = setup({
      routes: {
        "http://x/chunked": {
          body: ["he", new Uint8Array([108, 108]), "o", "", " world"],
        },
      },
    });
    const results: GetResult[] = [];

    getAsync(scheduler, "http://x/chunked", null, (_, r) => results.push(r));
    scheduler.tick();

    expect(results).toHaveLength(1);
    const [result] = results;
    expectOk(result);
    expect(text(result.value)).toBe("hello world");
  });

  it("keeps chunk contents even if the engine reuses its memory", () => {
    const shared = new TextEncoder().encode("ab");
    const { scheduler } = setup({ routes: { "http://x/reuse": { body: [shared, shared] } } });
    let body = "";

    getAsync(scheduler, "http://x/reuse", null, (_, r) => {
      if (r.ok) body = text(r.value);
    });
    scheduler.tick();

    expect(body).toBe("abab");
  });

  it("reports an empty body as an empty buffer", () => {
    const { scheduler } = setup({ routes: { "http://x/empty": { status: 204 } } });
    const results: GetResult[] = [];

    getAsync(scheduler, "http://x/empty", null, (_, r) => results.push(r));
    scheduler.tick();

    expect(results).toEqual([{ ok: true, value: new Uint8Array(0) }]);
  });

  it("turns a non-success status into ProtocolError with the body", () => {
    const { scheduler } = setup({
      routes: { "http://x/missing": { status: 404, body: "not here" } },
    });
    const results: GetResult[] = [];

    getAsync(scheduler, "http://x/missing", null, (_, r) => results.push(r));
    scheduler.tick();

    expect(results).toHaveLength(1);
    const [result] = results;
    expectErr(result);
    expect(result.error._tag).toBe("ProtocolError");
    if (result.error._tag === "ProtocolError") {
      expect(result.error.status).toBe(404);
      expect(result.error.url).toBe("http://x/missing");
      expect(text(result.error.body)).toBe("not here");
    }
  });

  it("turns an engine failure into TransferAborted", () => {
    const reason = new Error("connection refused");
    const { scheduler } = setup({ routes: { "http://x/down": { error: reason } } });
    const results: GetResult[] = [];

    getAsync(scheduler, "http://x/down", null, (_, r) => results.push(r));
    scheduler.tick();

    expect(results).toEqual([
      { ok: false, error: { _tag: "TransferAborted", url: "http://x/down", reason } },
    ]);
  });

  it("follows redirects by default", () => {
    const { engine, scheduler } = setup({
      routes: {
        "http://x/old": { status: 301, location: "/new" },
        "http://x/new": { body: "moved" },
      },
    });
    let body: string | undefined;

    getAsync(scheduler, "http://x/old", null, (_, r) => {
      if (r.ok) body = text(r.value);
    });
    scheduler.tick();
    expect(body).toBeUndefined();
    scheduler.tick();

    expect(body).toBe("moved");
    expect(engine.requests).toEqual(["http://x/old", "http://x/new"]);
  });

  it("reports the redirect itself when following is disabled", () => {
    const { scheduler } = setup({
      routes: { "http://x/old": { status: 302, location: "/new" } },
    });
    let status: number | undefined;

    getAsync(
      scheduler,
      "http://x/old",
      null,
      (_, r) => {
        if (!r.ok && r.error._tag === "ProtocolError") status = r.error.status;
      },
      { followRedirects: false }
    );
    scheduler.tick();

    expect(status).toBe(302);
  });

  it("aborts after too many redirect hops", () => {
    const { scheduler } = setup({
      routes: {
        "http://x/a": { status: 302, location: "http://x/b" },
        "http://x/b": { status: 302, location: "http://x/a" },
      },
    });
    let tag: string | undefined;

    getAsync(
      scheduler,
      "http://x/a",
      null,
      (_, r) => {
        if (!r.ok) tag = r.error._tag;
      },
      { maxRedirects: 2 }
    );
    for (let i = 0; i < 3; i++) scheduler.tick();

    expect(tag).toBe("TransferAborted");
  });

  it("reports transfer outcomes as events", () => {
    const { scheduler, events } = setup({
      routes: {
        "http://x/ok": { body: "abc" },
        "http://x/bad": { status: 500 },
      },
    });
    const okHandle = getAsync(scheduler, "http://x/ok", null, () => {});
    const badHandle = getAsync(scheduler, "http://x/bad", null, () => {});
    scheduler.tick();

    expect(events.filter((e) => e.type === "transfer_complete")).toEqual([
      {
        type: "transfer_complete",
        schedulerId: scheduler.id,
        transferId: okHandle.id,
        url: "http://x/ok",
        status: 200,
        bytes: 3,
        durationMs: 0,
        ts: 0,
      },
    ]);
    const errors = events.filter((e) => e.type === "transfer_error");
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ transferId: badHandle.id, status: 500 });
  });
});

describe("event hook failures", () => {
  it("still delivers the result when the hook throws on the outcome event", () => {
    const engine = createMockEngine({ routes: { "http://x/a": { body: "a" } } });
    const hookError = new Error("hook down");
    const scheduler = unwrap(
      AsyncScheduler.create(engine, {
        onEvent: (e) => {
          if (e.type === "transfer_complete") throw hookError;
        },
      })
    );
    const results: GetResult[] = [];

    getAsync(scheduler, "http://x/a", null, (_, r) => results.push(r));

    expect(() => scheduler.tick()).toThrow(hookError);
    expect(results).toHaveLength(1);
    expect(scheduler.pendingCount).toBe(0);
    expect(engine.liveTransfers).toBe(0);
  });

  it("leaves nothing registered when the hook throws on registration", () => {
    const engine = createMockEngine({ routes: { "http://x/a": { body: "a" } } });
    const hookError = new Error("hook down");
    const scheduler = unwrap(
      AsyncScheduler.create(engine, {
        onEvent: (e) => {
          if (e.type === "transfer_registered") throw hookError;
        },
      })
    );
    const onComplete = vi.fn<GetCallback<null>>();

    expect(() => getAsync(scheduler, "http://x/a", null, onComplete)).toThrow(hookError);

    expect(scheduler.pendingCount).toBe(0);
    expect(engine.liveTransfers).toBe(0);
    expect(engine.attachedTransfers).toBe(0);
    scheduler.tick();
    expect(onComplete).not.toHaveBeenCalled();
    scheduler.destroy();
  });
});
