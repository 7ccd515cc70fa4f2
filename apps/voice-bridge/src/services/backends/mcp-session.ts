import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { Logger } from "pino";
import { z } from "zod";
import { TransportFailure } from "../capabilities/errors.js";
import type {
  BackendCallOptions,
  BackendCallOutcome,
  BackendCapability,
  BackendDisconnectListener,
  BackendSession
} from "./types.js";

const ContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    mimeType: z.string().optional(),
    uri: z.string().optional()
  })
  .passthrough();

const ToolCallResultSchema = z
  .object({
    content: z.array(ContentBlockSchema).optional(),
    structuredContent: z.record(z.unknown()).optional(),
    isError: z.boolean().optional(),
    toolResult: z.unknown().optional()
  })
  .passthrough();

type ToolCallResult = z.infer<typeof ToolCallResultSchema>;

function parseTextBlock(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    return text;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return text;
  }
}

function renderBlock(block: z.infer<typeof ContentBlockSchema>): string {
  if (block.type === "text" && block.text !== undefined) {
    return block.text;
  }
  const detail = block.mimeType ?? block.uri;
  return detail ? `[${block.type} ${detail}]` : `[${block.type}]`;
}

/** Reduces an MCP tool result to the value handed back to the voice peer. */
export function toolResultPayload(result: ToolCallResult): unknown {
  if (result.structuredContent !== undefined) {
    return result.structuredContent;
  }

  if (result.content) {
    const [first] = result.content;
    if (result.content.length === 1 && first?.type === "text" && first.text !== undefined) {
      return parseTextBlock(first.text);
    }
    return result.content.map(renderBlock);
  }

  return result.toolResult ?? null;
}

export interface McpBackendSessionOptions {
  id: string;
  client: Client;
  logger: Logger;
  requestTimeoutMs: number;
}

export class McpBackendSession implements BackendSession {
  readonly id: string;
  private client: Client;
  private logger: Logger;
  private requestTimeoutMs: number;
  private isConnected = true;
  private listeners = new Set<BackendDisconnectListener>();

  constructor(options: McpBackendSessionOptions) {
    this.id = options.id;
    this.client = options.client;
    this.logger = options.logger;
    this.requestTimeoutMs = options.requestTimeoutMs;

    this.client.onclose = () => {
      this.markDisconnected(new TransportFailure("backend", `backend '${this.id}' stream closed`));
    };
    this.client.onerror = (error) => {
      this.logger.warn({ session_id: this.id, error: error.message }, "backend transport error");
    };
  }

  get connected(): boolean {
    return this.isConnected;
  }

  async listCapabilities(): Promise<BackendCapability[]> {
    const capabilities: BackendCapability[] = [];
    let cursor: string | undefined;

    do {
      const page = await this.client.listTools(cursor ? { cursor } : undefined);
      for (const tool of page.tools) {
        capabilities.push({
          name: tool.name,
          description: tool.description ?? "",
          inputSchema: tool.inputSchema
        });
      }
      cursor = page.nextCursor;
    } while (cursor);

    return capabilities;
  }

  async call(name: string, args: Record<string, unknown>, options: BackendCallOptions = {}): Promise<BackendCallOutcome> {
    if (!this.isConnected) {
      throw new TransportFailure("backend", `backend '${this.id}' is not connected`);
    }

    const raw = await this.client.callTool({ name, arguments: args }, undefined, {
      signal: options.signal,
      timeout: this.requestTimeoutMs
    });

    const parsed = ToolCallResultSchema.safeParse(raw);
    if (!parsed.success) {
      return { isError: true, payload: "backend returned a malformed tool result" };
    }

    return {
      isError: parsed.data.isError === true,
      payload: toolResultPayload(parsed.data)
    };
  }

  onDisconnect(listener: BackendDisconnectListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    if (!this.isConnected) {
      return;
    }
    await this.client.close();
    this.markDisconnected();
  }

  private markDisconnected(error?: Error): void {
    if (!this.isConnected) {
      return;
    }
    this.isConnected = false;
    for (const listener of Array.from(this.listeners)) {
      listener(error);
    }
    this.listeners.clear();
  }
}

export async function connectMcpSession(
  id: string,
  transport: Transport,
  options: { logger: Logger; requestTimeoutMs: number }
): Promise<McpBackendSession> {
  const client = new Client({ name: "voice-bridge", version: "0.1.0" }, { capabilities: {} });
  const session = new McpBackendSession({
    id,
    client,
    logger: options.logger,
    requestTimeoutMs: options.requestTimeoutMs
  });
  await client.connect(transport);
  return session;
}
