import { readFile } from "node:fs/promises";

export const DEFAULT_SYSTEM_INSTRUCTION = [
  "You are a hands-free voice assistant for an operator at a terminal.",
  "You can call the declared tools to inspect and control the operator's systems.",
  "Call a tool whenever the request needs live data or an action; never guess results.",
  "After a tool returns, summarize the outcome in one or two spoken sentences.",
  "If a tool fails, say what failed and suggest the next step."
].join(" ");

export async function loadSystemInstruction(path: string | undefined): Promise<string> {
  if (!path) {
    return DEFAULT_SYSTEM_INSTRUCTION;
  }
  const text = (await readFile(path, "utf8")).trim();
  return text || DEFAULT_SYSTEM_INSTRUCTION;
}
