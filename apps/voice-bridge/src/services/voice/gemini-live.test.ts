import type { IncomingMessage } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";
import { silentLogger } from "../../test/fakes.js";
import {
  buildAudioMessage,
  buildSetupMessage,
  buildTextMessage,
  buildToolResponseMessage,
  decodeServerMessage,
  GeminiLivePeer
} from "./gemini-live.js";
import type { PeerToolCall, VoicePeerHooks } from "./types.js";

describe("decodeServerMessage", () => {
  it("orders content events the way they must be applied", () => {
    const events = decodeServerMessage({
      serverContent: {
        interrupted: true,
        inputTranscription: { text: "list agents" },
        modelTurn: {
          parts: [
            { inlineData: { mimeType: "audio/pcm;rate=24000", data: Buffer.from("pcm").toString("base64") } },
            { text: "planning", thought: true },
            { text: "Here they are." }
          ]
        },
        outputTranscription: { text: "Here" },
        turnComplete: true
      }
    });

    expect(events).toEqual([
      { type: "interrupted" },
      { type: "inputTranscript", text: "list agents" },
      { type: "audio", chunk: Buffer.from("pcm") },
      { type: "text", text: "Here they are." },
      { type: "outputTranscript", text: "Here" },
      { type: "turnComplete" }
    ]);
  });

  it("maps function calls and flags malformed ones", () => {
    const events = decodeServerMessage({
      toolCall: {
        functionCalls: [
          { id: "c1", name: "launch", args: { project: "demo" } },
          { id: "c2", name: "status" },
          { id: "c3", name: "launch", args: "demo" },
          { id: "c4", args: {} }
        ]
      }
    });

    const calls: PeerToolCall[] = [
      { request: { callId: "c1", capabilityName: "launch", arguments: { project: "demo" } } },
      { request: { callId: "c2", capabilityName: "status", arguments: {} } },
      {
        request: { callId: "c3", capabilityName: "launch", arguments: {} },
        malformed: "function call arguments must be an object"
      },
      { request: { callId: "c4", capabilityName: "", arguments: {} }, malformed: "function call has no name" }
    ];
    expect(events).toEqual([{ type: "toolCall", calls }]);
  });

  it("decodes setup, cancellation and session end notices", () => {
    expect(decodeServerMessage({ setupComplete: {} })).toEqual([{ type: "setupComplete" }]);
    expect(decodeServerMessage({ toolCallCancellation: { ids: ["c1", "c2"] } })).toEqual([
      { type: "toolCallCancellation", callIds: ["c1", "c2"] }
    ]);
    expect(decodeServerMessage({ goAway: { timeLeft: "10s" } })).toEqual([{ type: "goAway", timeLeft: "10s" }]);
  });

  it("rejects messages of the wrong shape", () => {
    expect(decodeServerMessage("hello")).toBeNull();
    expect(decodeServerMessage({ toolCall: { functionCalls: "c1" } })).toBeNull();
    expect(decodeServerMessage({ usageMetadata: { totalTokenCount: 3 } })).toEqual([]);
  });
});

describe("client messages", () => {
  it("builds a setup message with tools only when there are any", () => {
    const declarations = [{ name: "status", description: "Agent status" }];

    expect(
      buildSetupMessage("models/test-model", {
        systemInstruction: "be brief",
        functionDeclarations: declarations,
        googleSearch: true
      })
    ).toEqual({
      setup: {
        model: "models/test-model",
        generationConfig: { responseModalities: ["AUDIO"] },
        systemInstruction: { parts: [{ text: "be brief" }] },
        tools: [{ functionDeclarations: declarations }, { googleSearch: {} }],
        inputAudioTranscription: {},
        outputAudioTranscription: {}
      }
    });

    const bare = buildSetupMessage("models/test-model", {
      systemInstruction: "be brief",
      functionDeclarations: [],
      googleSearch: false
    });
    expect(bare).toEqual({
      setup: expect.not.objectContaining({ tools: expect.anything() })
    });
  });

  it("encodes audio and text turns", () => {
    expect(buildAudioMessage(Buffer.from([1, 2, 3]), 16_000)).toEqual({
      realtimeInput: { audio: { mimeType: "audio/pcm;rate=16000", data: "AQID" } }
    });
    expect(buildTextMessage("status?")).toEqual({
      clientContent: { turns: [{ role: "user", parts: [{ text: "status?" }] }], turnComplete: true }
    });
  });

  it("wraps results and errors in function responses", () => {
    expect(
      buildToolResponseMessage([
        { callId: "c1", capabilityName: "status", success: true, payload: { agents: 2 } },
        { callId: "", capabilityName: "launch", success: false, error: "CapabilityTimeout", message: "too slow" }
      ])
    ).toEqual({
      toolResponse: {
        functionResponses: [
          { id: "c1", name: "status", response: { result: { agents: 2 } } },
          { name: "launch", response: { error: "CapabilityTimeout", message: "too slow" } }
        ]
      }
    });
  });
});

describe("GeminiLivePeer", () => {
  let server: WebSocketServer | null = null;

  afterEach(async () => {
    const current = server;
    server = null;
    if (current) {
      for (const client of current.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => current.close(() => resolve()));
    }
  });

  async function listen(onConnection: (socket: WebSocket, request: IncomingMessage) => void): Promise<string> {
    const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });
    server = wss;
    wss.on("connection", onConnection);
    await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
    const address = wss.address();
    if (typeof address === "string") {
      throw new Error(`unexpected listen address ${address}`);
    }
    return `ws://127.0.0.1:${address.port}/live`;
  }

  function hooks(): VoicePeerHooks {
    return {
      onAudio: vi.fn(),
      onText: vi.fn(),
      onInputTranscript: vi.fn(),
      onOutputTranscript: vi.fn(),
      onTurnComplete: vi.fn(),
      onInterrupted: vi.fn(),
      onToolCall: vi.fn(),
      onToolCallCancellation: vi.fn(),
      onClose: vi.fn()
    };
  }

  function peer(url: string, setupTimeoutMs = 1000): GeminiLivePeer {
    return new GeminiLivePeer({
      url,
      apiKey: "test-secret",
      model: "models/test-model",
      inputSampleRateHz: 16_000,
      setupTimeoutMs,
      logger: silentLogger()
    });
  }

  it("completes setup, relays tool calls and sends the responses back", async () => {
    const received: unknown[] = [];
    const url = await listen((socket) => {
      socket.on("message", (raw) => {
        const message: unknown = JSON.parse(raw.toString());
        received.push(message);
        if (received.length === 1) {
          socket.send(JSON.stringify({ setupComplete: {} }));
          socket.send(JSON.stringify({ toolCall: { functionCalls: [{ id: "c1", name: "status", args: {} }] } }));
        }
      });
    });
    const peerHooks = hooks();
    const live = peer(url);

    await live.connect({ systemInstruction: "be brief", functionDeclarations: [], googleSearch: false }, peerHooks);
    await vi.waitFor(() => expect(peerHooks.onToolCall).toHaveBeenCalledTimes(1));
    expect(peerHooks.onToolCall).toHaveBeenCalledWith([
      { request: { callId: "c1", capabilityName: "status", arguments: {} } }
    ]);

    live.sendToolResponses([{ callId: "c1", capabilityName: "status", success: true, payload: "idle" }]);
    await vi.waitFor(() => expect(received).toHaveLength(2));

    expect(received[0]).toMatchObject({ setup: { model: "models/test-model" } });
    expect(received[1]).toEqual({
      toolResponse: { functionResponses: [{ id: "c1", name: "status", response: { result: "idle" } }] }
    });

    await live.close();
    expect(peerHooks.onClose).not.toHaveBeenCalled();
  });

  it("reports an abnormal close as a transport failure", async () => {
    const url = await listen((socket) => {
      socket.once("message", () => {
        socket.send(JSON.stringify({ setupComplete: {} }));
        setTimeout(() => socket.close(1011, "internal"), 10);
      });
    });
    const peerHooks = hooks();

    await peer(url).connect({ systemInstruction: "x", functionDeclarations: [], googleSearch: false }, peerHooks);

    await vi.waitFor(() =>
      expect(peerHooks.onClose).toHaveBeenCalledWith({ reason: "transport_failure", detail: "1011 internal" })
    );
  });

  it("fails setup when no acknowledgement arrives in time", async () => {
    const url = await listen(() => undefined);

    await expect(
      peer(url, 50).connect({ systemInstruction: "x", functionDeclarations: [], googleSearch: false }, hooks())
    ).rejects.toThrow("gemini_setup_timeout");
  });

  it("fails setup on a malformed frame instead of raising it", async () => {
    const url = await listen((socket, request) => {
      socket.once("message", () => {
        // Final frame with reserved opcode 0xF.
        request.socket.write(Buffer.from([0x8f, 0x00]));
      });
    });

    await expect(
      peer(url).connect({ systemInstruction: "x", functionDeclarations: [], googleSearch: false }, hooks())
    ).rejects.toThrow("gemini_setup_failed");
  });

  it("aborts a pending setup when closed", async () => {
    const url = await listen(() => undefined);
    const live = peer(url, 60_000);
    const peerHooks = hooks();
    const connecting = live.connect({ systemInstruction: "x", functionDeclarations: [], googleSearch: false }, peerHooks);
    const outcome = connecting.then(
      () => "connected",
      (error: unknown) => (error instanceof Error ? error.name : "unknown")
    );
    await vi.waitFor(() => expect(server?.clients.size).toBe(1));

    const startedAt = Date.now();
    await live.close();

    expect(await outcome).toBe("TransportFailure");
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(peerHooks.onClose).not.toHaveBeenCalled();
  });
});
