import { withSessionLock, clearAllLocks, getActiveLockCount } from "../stateLock";
import { LockTimeoutError } from "../errors";

jest.mock("../logger", () => ({
  log: jest.fn(),
  logWarn: jest.fn(),
  logError: jest.fn(),
  logEvent: jest.fn(),
}));

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("withSessionLock", () => {
  beforeEach(() => {
    clearAllLocks();
  });

  afterEach(() => {
    clearAllLocks();
  });

  it("executes function and returns result", async () => {
    const result = await withSessionLock("session1", "test", async () => 42);
    expect(result).toBe(42);
  });

  it("serializes concurrent operations on one session", async () => {
    const order: string[] = [];

    const p1 = withSessionLock("session1", "triage", async () => {
      order.push("triage:start");
      await sleep(30);
      order.push("triage:end");
    });
    const p2 = withSessionLock("session1", "update", async () => {
      order.push("update");
    });

    await Promise.all([p1, p2]);
    expect(order).toEqual(["triage:start", "triage:end", "update"]);
  });

  it("does not make different sessions wait on each other", async () => {
    const order: string[] = [];

    const p1 = withSessionLock("session1", "slow", async () => {
      await sleep(30);
      order.push("s1");
    });
    const p2 = withSessionLock("session2", "fast", async () => {
      order.push("s2");
    });

    await Promise.all([p1, p2]);
    expect(order).toEqual(["s2", "s1"]);
  });

  it("releases the lock on success and on error", async () => {
    await withSessionLock("session1", "ok", async () => undefined);
    expect(getActiveLockCount()).toBe(0);

    await expect(
      withSessionLock("session1", "fail", async () => {
        throw new Error("test error");
      })
    ).rejects.toThrow("test error");
    expect(getActiveLockCount()).toBe(0);
  });

  it("counts sessions with pending operations", async () => {
    const pending = withSessionLock("session1", "slow", () => sleep(20));
    expect(getActiveLockCount()).toBe(1);
    await pending;
    expect(getActiveLockCount()).toBe(0);
  });

  it("lets the next operation run after a failure", async () => {
    const failing = withSessionLock("session1", "fail", async () => {
      throw new Error("boom");
    });
    const next = withSessionLock("session1", "next", async () => "ran");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ran");
  });

  it("times out when an earlier operation holds the lock too long", async () => {
    const slow = withSessionLock("session1", "slow", () => sleep(100));
    const waiting = withSessionLock("session1", "waiting", async () => "never", 20);

    await expect(waiting).rejects.toBeInstanceOf(LockTimeoutError);
    await expect(waiting).rejects.toMatchObject({ code: "lock_timeout" });
    await slow;
  });
});
