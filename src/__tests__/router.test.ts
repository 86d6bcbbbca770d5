import WebSocket from "ws";
import { makeRouter, rawDataToString } from "../router";
import { SessionManager } from "../sessionManager";
import { createGuideHandlers } from "../handlers";
import { clearAllLocks } from "../stateLock";
import type { ClientContext } from "../transport";
import { GuideOrchestrator } from "../guide/orchestrator";
import { FakeGenerationClient, triageJson, type FakeScript } from "../guide/__tests__/fakeGeneration";

jest.mock("../logger", () => ({
  log: jest.fn(),
  logWarn: jest.fn(),
  logError: jest.fn(),
  logEvent: jest.fn(),
}));

function fakeSocket(readyState: number = WebSocket.OPEN) {
  return { readyState, send: jest.fn<void, [string]>() };
}

type FakeSocket = ReturnType<typeof fakeSocket>;

function received(ws: FakeSocket): unknown[] {
  return ws.send.mock.calls.map(([data]) => {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  });
}

function lastReceived(ws: FakeSocket): unknown {
  const all = received(ws);
  return all[all.length - 1];
}

function newClient(): ClientContext {
  return { joined: false, sessionId: null };
}

function setup(script: FakeScript = {}) {
  const generation = new FakeGenerationClient(script);
  const orchestrator = new GuideOrchestrator({ generation, now: () => 1000 });
  const sessionManager = new SessionManager((sessionId) => orchestrator.start(sessionId));
  const handlers = createGuideHandlers({ orchestrator, sessionManager, lockTimeoutMs: 1000 });
  const route = makeRouter({ sessionManager, handlers });
  return { generation, sessionManager, route };
}

const msg = (body: Record<string, unknown>) => JSON.stringify(body);

describe("router", () => {
  afterEach(() => {
    clearAllLocks();
  });

  it("rejects invalid JSON", async () => {
    const { route } = setup();
    const ws = fakeSocket();
    await route(ws, newClient(), "{not json");
    expect(received(ws)).toEqual([{ type: "error", message: "Invalid JSON" }]);
  });

  it("rejects messages that fail validation", async () => {
    const { route } = setup();
    const ws = fakeSocket();
    await route(ws, newClient(), msg({ type: "triage", sessionId: "s1" }));
    expect(received(ws)).toEqual([{ type: "error", message: "Invalid message shape" }]);
  });

  it("answers ping without a join", async () => {
    const { route } = setup();
    const ws = fakeSocket();
    await route(ws, newClient(), msg({ type: "ping" }));
    expect(received(ws)).toEqual([{ type: "pong" }]);
  });

  it("requires a join before guide operations", async () => {
    const { route, generation } = setup();
    const ws = fakeSocket();
    await route(ws, newClient(), msg({ type: "triage", sessionId: "s1", text: "He collapsed" }));
    expect(received(ws)).toEqual([{ type: "error", message: "Must join first" }]);
    expect(generation.calls).toHaveLength(0);
  });

  it("replies to a join with the session state", async () => {
    const { route, sessionManager } = setup();
    const ws = fakeSocket();
    const ctx = newClient();
    await route(ws, ctx, msg({ type: "join", sessionId: "s1" }));

    expect(received(ws)).toEqual([{ type: "joined", sessionId: "s1", state: "unstarted" }]);
    expect(ctx).toEqual({ joined: true, sessionId: "s1" });
    expect(sessionManager.getSessionCount()).toBe(1);
  });

  it("rejects messages for another session", async () => {
    const { route } = setup();
    const ws = fakeSocket();
    const ctx = newClient();
    await route(ws, ctx, msg({ type: "join", sessionId: "s1" }));
    await route(ws, ctx, msg({ type: "report", sessionId: "s2" }));
    expect(lastReceived(ws)).toEqual({ type: "error", sessionId: "s2", message: "Session mismatch" });
  });

  it("runs triage, an update and the report for a joined session", async () => {
    const { route } = setup({
      triage: triageJson("cardiac_arrest"),
      calmer: "Stay with them.",
      reporter: "EMT report text",
    });
    const ws = fakeSocket();
    const ctx = newClient();
    await route(ws, ctx, msg({ type: "join", sessionId: "s1" }));

    await route(ws, ctx, msg({ type: "triage", sessionId: "s1", text: "He collapsed" }));
    expect(lastReceived(ws)).toEqual({
      type: "triage_result",
      sessionId: "s1",
      emergencyType: "cardiac_arrest",
      protocolTitle: "Suspected Cardiac Arrest (Adult)",
      firstStep: "1. Call emergency services right away, or have someone nearby call on speaker.",
      stepCount: 5,
      confidence: 0.9,
      redFlags: ["not breathing"],
    });

    await route(ws, ctx, msg({ type: "update", sessionId: "s1", text: "Ambulance called" }));
    expect(lastReceived(ws)).toEqual({
      type: "instruction",
      sessionId: "s1",
      instructionMessage: "2. Lay the person on their back on a firm, flat surface.",
      calmingMessage: "Stay with them.",
      done: false,
      stepIndex: 1,
      stepCount: 5,
    });

    await route(ws, ctx, msg({ type: "report", sessionId: "s1" }));
    expect(lastReceived(ws)).toEqual({ type: "report", sessionId: "s1", text: "EMT report text" });
  });

  it("sends the triage_required code when updating before triage", async () => {
    const { route } = setup();
    const ws = fakeSocket();
    const ctx = newClient();
    await route(ws, ctx, msg({ type: "join", sessionId: "s1" }));
    await route(ws, ctx, msg({ type: "update", sessionId: "s1", text: "Done" }));

    expect(lastReceived(ws)).toEqual({
      type: "error",
      sessionId: "s1",
      code: "triage_required",
      message: "Protocol is not set for session s1; run triage before advanceInstruction",
    });
  });

  it("sends the protocol_not_found code for an unknown emergency type", async () => {
    const { route } = setup({ triage: triageJson("heart_attack") });
    const ws = fakeSocket();
    const ctx = newClient();
    await route(ws, ctx, msg({ type: "join", sessionId: "s1" }));
    await route(ws, ctx, msg({ type: "triage", sessionId: "s1", text: "Chest pain" }));

    expect(lastReceived(ws)).toEqual({
      type: "error",
      sessionId: "s1",
      code: "protocol_not_found",
      message: 'Protocol lookup failed: unknown emergency type "heart_attack"',
    });
  });

  it("shares one session context between sockets and broadcasts results", async () => {
    const { route, sessionManager, generation } = setup({ triage: triageJson("choking") });
    const phone = fakeSocket();
    const watch = fakeSocket();
    const phoneCtx = newClient();
    const watchCtx = newClient();

    await route(phone, phoneCtx, msg({ type: "join", sessionId: "s1" }));
    await route(phone, phoneCtx, msg({ type: "triage", sessionId: "s1", text: "She is choking" }));
    await route(watch, watchCtx, msg({ type: "join", sessionId: "s1" }));

    expect(lastReceived(watch)).toEqual({ type: "joined", sessionId: "s1", state: "triaged" });
    expect(sessionManager.getSessionCount()).toBe(1);

    await route(watch, watchCtx, msg({ type: "update", sessionId: "s1", text: "She can't cough" }));
    expect(lastReceived(phone)).toEqual(lastReceived(watch));
    expect(lastReceived(phone)).toMatchObject({ type: "instruction", stepIndex: 1, stepCount: 4 });
    expect(generation.personasCalled()).toEqual(["triage", "instructor", "calmer"]);
  });

  it("skips sockets that are no longer open", async () => {
    const { route } = setup({ triage: triageJson("possible_stroke") });
    const open = fakeSocket();
    const closing = fakeSocket();
    const openCtx = newClient();
    const closingCtx = newClient();
    await route(open, openCtx, msg({ type: "join", sessionId: "s1" }));
    await route(closing, closingCtx, msg({ type: "join", sessionId: "s1" }));
    closing.readyState = WebSocket.CLOSING;

    await route(open, openCtx, msg({ type: "triage", sessionId: "s1", text: "Face drooping" }));

    expect(lastReceived(open)).toMatchObject({ type: "triage_result", emergencyType: "possible_stroke" });
    expect(received(closing)).toEqual([{ type: "joined", sessionId: "s1", state: "unstarted" }]);
  });

  it("moves a socket when it joins a different session", async () => {
    const { route, sessionManager } = setup();
    const ws = fakeSocket();
    const ctx = newClient();
    await route(ws, ctx, msg({ type: "join", sessionId: "s1" }));
    await route(ws, ctx, msg({ type: "join", sessionId: "s2" }));

    expect(sessionManager.getContext("s1")).toBeUndefined();
    expect(sessionManager.getContext("s2")?.sessionId).toBe("s2");
    expect(ctx.sessionId).toBe("s2");
  });

  it("drops the session context when the last socket leaves", async () => {
    const { route, sessionManager } = setup();
    const onEmpty = jest.fn();
    sessionManager.onSessionEmpty(onEmpty);
    const a = fakeSocket();
    const b = fakeSocket();
    await route(a, newClient(), msg({ type: "join", sessionId: "s1" }));
    await route(b, newClient(), msg({ type: "join", sessionId: "s1" }));

    sessionManager.leave("s1", a);
    expect(sessionManager.getContext("s1")).toBeDefined();
    expect(onEmpty).not.toHaveBeenCalled();

    sessionManager.leave("s1", b);
    expect(sessionManager.getContext("s1")).toBeUndefined();
    expect(onEmpty).toHaveBeenCalledWith("s1");
  });
});

describe("rawDataToString", () => {
  it("decodes strings, buffers, fragments and array buffers", () => {
    expect(rawDataToString("hi")).toBe("hi");
    expect(rawDataToString(Buffer.from("hello"))).toBe("hello");
    expect(rawDataToString([Buffer.from("hel"), Buffer.from("lo")])).toBe("hello");
    const arrayBuffer = new ArrayBuffer(2);
    new Uint8Array(arrayBuffer).set([104, 105]);
    expect(rawDataToString(arrayBuffer)).toBe("hi");
  });
});
