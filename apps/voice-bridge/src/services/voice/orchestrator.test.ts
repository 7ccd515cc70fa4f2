import { describe, expect, it, vi } from "vitest";
import { FakeBackendSession, FakeCapture, FakePeer, FakeSink, objectSchema, silentLogger } from "../../test/fakes.js";
import { registerBackendSessions } from "../capabilities/discovery.js";
import { CapabilityRegistry } from "../capabilities/registry.js";
import { CapabilityRouter } from "../capabilities/router.js";
import { SessionOrchestrator } from "./orchestrator.js";
import { SessionEventBus, type SessionEvent } from "./session-events.js";
import type { PeerToolCall } from "./types.js";

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

function gate() {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

function call(callId: string, capabilityName: string, args: Record<string, unknown> = {}): PeerToolCall {
  return { request: { callId, capabilityName, arguments: args } };
}

async function createSession(options: { startMuted?: boolean } = {}) {
  const logger = silentLogger();
  const registry = new CapabilityRegistry(logger);
  const router = new CapabilityRouter({ registry, logger, timeoutMs: 5000 });
  const backend = new FakeBackendSession("ops", [
    {
      name: "launch",
      description: "Launch an agent",
      inputSchema: objectSchema({ project: { type: "string" } }, ["project"])
    },
    { name: "status", description: "Agent status", inputSchema: objectSchema({}) }
  ]);
  await registerBackendSessions([backend], registry, router, logger);

  const peer = new FakePeer();
  const capture = new FakeCapture();
  const sink = new FakeSink();
  const events = new SessionEventBus(logger);
  const seen: SessionEvent[] = [];
  events.subscribe((event) => seen.push(event));

  const orchestrator = new SessionOrchestrator({
    peer,
    capture,
    playbackSink: sink,
    registry,
    router,
    events,
    logger,
    systemInstruction: "test instruction",
    googleSearch: false,
    startMuted: options.startMuted ?? false,
    // 48 bytes of output audio last one millisecond.
    outputSampleRateHz: 24_000,
    drainGraceMs: 0
  });

  return { orchestrator, backend, peer, capture, sink, seen };
}

function states(seen: SessionEvent[]): string[] {
  return seen.flatMap((event) => (event.type === "stateChange" ? [event.to] : []));
}

describe("SessionOrchestrator", () => {
  it("advertises translated declarations and starts listening", async () => {
    const { orchestrator, peer } = await createSession();

    await orchestrator.start();

    expect(peer.config).toEqual({
      systemInstruction: "test instruction",
      googleSearch: false,
      functionDeclarations: [
        {
          name: "launch",
          description: "Launch an agent",
          parameters: { type: "object", properties: { project: { type: "string" } }, required: ["project"] }
        },
        { name: "status", description: "Agent status" }
      ]
    });
    expect(orchestrator.snapshot()).toMatchObject({ state: "Listening", micOpen: true, capabilities: ["launch", "status"] });
  });

  it("forwards microphone frames only while unmuted", async () => {
    const { orchestrator, peer, capture } = await createSession();
    await orchestrator.start();

    capture.frame();
    await orchestrator.setMuted(true);
    capture.frame();

    expect(peer.audio).toHaveLength(1);
  });

  it("ends a tool turn in AwaitingResponse whether the call succeeds or fails", async () => {
    const { orchestrator, peer, seen } = await createSession();
    await orchestrator.start();

    peer.server.onText("Let me check.");
    peer.server.onToolCall([call("c1", "launch", { project: "demo" })]);
    await settle();

    expect(peer.toolResponses).toEqual([
      [{ callId: "c1", capabilityName: "launch", success: true, payload: { ran: "launch" } }]
    ]);
    expect(states(seen)).toEqual(["Listening", "AwaitingResponse", "ToolPending", "AwaitingResponse"]);

    peer.server.onTurnComplete();
    peer.server.onText("Checking again.");
    peer.server.onToolCall([call("c2", "deploy")]);
    await settle();

    expect(peer.toolResponses[1]).toEqual([
      {
        callId: "c2",
        capabilityName: "deploy",
        success: false,
        error: "UnknownCapability",
        message: "unknown capability 'deploy'"
      }
    ]);
    expect(orchestrator.snapshot().state).toBe("AwaitingResponse");
  });

  it("sends no microphone audio from ToolPending entry until the answer has played out", async () => {
    const { orchestrator, backend, peer, capture } = await createSession();
    const release = gate();
    backend.handler = async (name) => {
      await release.promise;
      return { isError: false, payload: { ran: name } };
    };
    await orchestrator.start();

    peer.server.onToolCall([call("c1", "status")]);
    await settle();
    expect(orchestrator.snapshot().state).toBe("ToolPending");
    capture.frame();
    capture.frame();

    release.open();
    await settle();
    expect(peer.toolResponses).toHaveLength(1);
    expect(orchestrator.snapshot()).toMatchObject({ state: "AwaitingResponse", echoHold: true });
    capture.frame();

    // A tenth of a second of audio keeps playback active across the next checks.
    peer.server.onAudio(Buffer.alloc(4_800));
    await settle();
    expect(orchestrator.snapshot()).toMatchObject({ state: "Speaking", playbackActive: true });
    capture.frame();

    peer.server.onTurnComplete();
    await vi.waitFor(() => {
      expect(orchestrator.snapshot()).toMatchObject({ state: "Listening", playbackActive: false, echoHold: false });
    });
    expect(peer.audio).toHaveLength(0);

    capture.frame();
    expect(peer.audio).toHaveLength(1);
  });

  it("releases the echo hold at end of turn when the answer has no audio", async () => {
    const { orchestrator, peer, capture } = await createSession();
    await orchestrator.start();

    peer.server.onToolCall([call("c1", "status")]);
    await settle();
    expect(orchestrator.snapshot().echoHold).toBe(true);

    peer.server.onText("All agents are idle.");
    peer.server.onTurnComplete();
    await settle();

    expect(orchestrator.snapshot()).toMatchObject({ state: "Listening", echoHold: false, micOpen: true });
    capture.frame();
    expect(peer.audio).toHaveLength(1);
  });

  it("rejects a second tool call while one is pending", async () => {
    const { orchestrator, backend, peer } = await createSession();
    const release = gate();
    backend.handler = async (name) => {
      await release.promise;
      return { isError: false, payload: { ran: name } };
    };
    await orchestrator.start();

    peer.server.onToolCall([call("c1", "launch", { project: "demo" })]);
    await settle();
    peer.server.onToolCall([call("c2", "status")]);
    await settle();

    expect(peer.toolResponses).toEqual([
      [
        {
          callId: "c2",
          capabilityName: "status",
          success: false,
          error: "ToolCallInProgress",
          message: "tool call 'c1' is still running"
        }
      ]
    ]);
    expect(backend.calls.map((item) => item.name)).toEqual(["launch"]);

    release.open();
    await settle();
    expect(peer.toolResponses[1]).toEqual([
      { callId: "c1", capabilityName: "launch", success: true, payload: { ran: "launch" } }
    ]);
  });

  it("answers a batch in one response, including malformed calls", async () => {
    const { orchestrator, backend, peer } = await createSession();
    await orchestrator.start();

    peer.server.onToolCall([
      call("c1", "status"),
      { request: { callId: "c2", capabilityName: "launch", arguments: {} }, malformed: "function call arguments must be an object" }
    ]);
    await settle();

    expect(peer.toolResponses).toEqual([
      [
        { callId: "c1", capabilityName: "status", success: true, payload: { ran: "status" } },
        {
          callId: "c2",
          capabilityName: "launch",
          success: false,
          error: "InvalidArguments",
          message: "function call arguments must be an object"
        }
      ]
    ]);
    expect(backend.calls.map((item) => item.name)).toEqual(["status"]);
  });

  it("sends a cancelled result when the peer withdraws the pending call", async () => {
    const { orchestrator, backend, peer } = await createSession();
    backend.handler = () => new Promise(() => undefined);
    await orchestrator.start();

    peer.server.onToolCall([call("c1", "status")]);
    await settle();
    peer.server.onToolCallCancellation(["c1"]);
    await settle();

    expect(backend.calls[0]?.signal?.aborted).toBe(true);
    expect(peer.toolResponses).toEqual([
      [
        {
          callId: "c1",
          capabilityName: "status",
          success: false,
          error: "CapabilityCancelled",
          message: "invocation cancelled"
        }
      ]
    ]);
  });

  it("releases everything on quit and drops later traffic", async () => {
    const { orchestrator, backend, peer, capture, sink } = await createSession();
    backend.handler = () => new Promise(() => undefined);
    await orchestrator.start();

    peer.server.onToolCall([call("c1", "status")]);
    await settle();

    await expect(orchestrator.quit()).resolves.toBe("user_quit");
    await settle();

    expect(orchestrator.snapshot().state).toBe("Closed");
    expect(backend.calls[0]?.signal?.aborted).toBe(true);
    expect(peer.toolResponses).toEqual([]);
    expect(capture.stopped).toBe(true);
    expect(peer.closed).toBe(true);
    expect(sink.stops).toBe(1);

    peer.server.onAudio(Buffer.alloc(48));
    await settle();
    expect(sink.writes).toEqual([]);
  });

  it("closes with transport_failure when the peer stream fails", async () => {
    const { orchestrator, peer } = await createSession();
    await orchestrator.start();

    peer.server.onClose({ reason: "transport_failure", detail: "1011 internal error" });

    await expect(orchestrator.closed).resolves.toBe("transport_failure");
  });

  it("closes when the peer cannot be reached", async () => {
    const { orchestrator, peer } = await createSession();
    peer.connectError = new Error("gemini_setup_timeout");

    await expect(orchestrator.start()).rejects.toThrow("gemini_setup_timeout");
    await expect(orchestrator.closed).resolves.toBe("transport_failure");
  });

  it("quits promptly while the peer connection is still being set up", async () => {
    const { orchestrator, peer, capture, seen } = await createSession();
    peer.holdConnect = true;

    const starting = orchestrator.start();
    await settle();
    expect(orchestrator.snapshot().state).toBe("Idle");

    await expect(orchestrator.quit()).resolves.toBe("user_quit");
    await expect(starting).resolves.toBeUndefined();

    expect(peer.closed).toBe(true);
    expect(capture.stopped).toBe(true);
    expect(states(seen)).toEqual(["Closed"]);
    expect(seen.filter((event) => event.type === "error")).toEqual([]);
  });

  it("sends typed text as a user turn", async () => {
    const { orchestrator, peer, seen } = await createSession();
    await orchestrator.start();

    await orchestrator.sendText("  how are the agents doing?  ");

    expect(peer.texts).toEqual(["how are the agents doing?"]);
    expect(orchestrator.snapshot().state).toBe("AwaitingResponse");
    expect(seen).toContainEqual(
      expect.objectContaining({ type: "transcriptLine", speaker: "user", source: "typed", text: "how are the agents doing?" })
    );
  });

  it("starts muted on request and toggles", async () => {
    const { orchestrator, peer, capture, seen } = await createSession({ startMuted: true });
    await orchestrator.start();

    capture.frame();
    expect(peer.audio).toHaveLength(0);
    expect(orchestrator.snapshot().muted).toBe(true);

    await expect(orchestrator.toggleMute()).resolves.toBe(false);
    capture.frame();

    expect(peer.audio).toHaveLength(1);
    expect(seen.flatMap((event) => (event.type === "muteChanged" ? [event.muted] : []))).toEqual([true, false]);
  });

  it("discards queued playback when the peer is interrupted", async () => {
    const { orchestrator, peer, sink } = await createSession();
    await orchestrator.start();

    peer.server.onAudio(Buffer.alloc(48_000));
    await settle();
    expect(orchestrator.snapshot()).toMatchObject({ state: "Speaking", playbackActive: true });

    peer.server.onInterrupted();
    await settle();

    expect(orchestrator.snapshot()).toMatchObject({ state: "Listening", playbackActive: false });
    expect(sink.stops).toBe(1);
    expect(sink.starts).toBe(2);
  });

  it("collects transcript fragments into one line per speaker turn", async () => {
    const { orchestrator, peer, seen } = await createSession();
    await orchestrator.start();

    peer.server.onInputTranscript("what is ");
    peer.server.onInputTranscript("running");
    peer.server.onOutputTranscript("Two agents ");
    peer.server.onOutputTranscript("are running.");
    peer.server.onTurnComplete();
    await settle();

    const lines = seen.flatMap((event) =>
      event.type === "transcriptLine" ? [`${event.speaker}/${event.source}: ${event.text}`] : []
    );
    expect(lines).toEqual(["user/speech: what is running", "assistant/speech: Two agents are running."]);
  });
});
