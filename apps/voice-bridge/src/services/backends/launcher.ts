import { readFile } from "node:fs/promises";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Logger } from "pino";
import { McpServersConfigSchema, type McpServerEntry } from "../../types.js";
import { connectMcpSession } from "./mcp-session.js";
import type { BackendSession } from "./types.js";

export class ConfigFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigFileError";
  }
}

export interface McpServerDefinition extends McpServerEntry {
  id: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function parseMcpServersConfig(raw: string, source = "mcp config"): McpServerDefinition[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigFileError(`${source}: invalid JSON`);
  }

  const parsed = McpServersConfigSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigFileError(`${source}: ${details}`);
  }

  return Object.entries(parsed.data.mcpServers).map(([id, entry]) => ({ id, ...entry }));
}

export async function loadMcpServersConfig(path: string, logger: Logger): Promise<McpServerDefinition[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger.warn({ path }, "mcp config not found, starting without backends");
      return [];
    }
    throw error;
  }
  return parseMcpServersConfig(raw, path);
}

/**
 * Spawns each configured server over stdio, in config order. A server that
 * fails to start is logged and skipped.
 */
export async function launchMcpSessions(
  servers: McpServerDefinition[],
  options: { logger: Logger; requestTimeoutMs: number }
): Promise<BackendSession[]> {
  const sessions: BackendSession[] = [];

  for (const server of servers) {
    const logger = options.logger.child({ session_id: server.id });
    const transport = new StdioClientTransport({
      command: server.command,
      args: server.args,
      env: server.env ? { ...getDefaultEnvironment(), ...server.env } : undefined,
      cwd: server.cwd,
      stderr: "pipe"
    });

    transport.stderr?.on("data", (chunk: Buffer) => {
      const text = chunk.toString("utf8").trim();
      if (text) {
        logger.debug({ stderr: text }, "backend stderr");
      }
    });

    try {
      const session = await connectMcpSession(server.id, transport, {
        logger,
        requestTimeoutMs: options.requestTimeoutMs
      });
      logger.info({ command: server.command }, "backend session connected");
      sessions.push(session);
    } catch (error) {
      logger.error(
        { command: server.command, error: error instanceof Error ? error.message : String(error) },
        "backend session failed to start"
      );
      await transport.close().catch(() => undefined);
    }
  }

  return sessions;
}
