import { z } from "zod";

export const McpServerEntrySchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().min(1).optional()
});

export const McpServersConfigSchema = z.object({
  mcpServers: z.record(z.string().min(1), McpServerEntrySchema)
});

export type McpServerEntry = z.infer<typeof McpServerEntrySchema>;

export const OperatorMuteSchema = z.object({
  muted: z.boolean().optional()
});

export const OperatorTextSchema = z.object({
  text: z.string().trim().min(1).max(4000)
});
