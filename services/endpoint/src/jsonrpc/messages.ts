import { z } from 'zod';
import type {
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  ServerId,
  ToolDescriptor,
} from '../types';

// ---------- Schemas ----------
const idSchema = z.union([z.string(), z.number()]);

const objectSchema = z.record(z.unknown());

const requestSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: idSchema,
    method: z.string().min(1),
    params: z.unknown().optional(),
  })
  .passthrough();

const notificationSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    method: z.string().min(1),
    params: z.unknown().optional(),
  })
  .passthrough();

const errorObjectSchema = z
  .object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
  })
  .passthrough();

const failureSchema = z
  .object({ jsonrpc: z.literal('2.0'), id: idSchema.nullable(), error: errorObjectSchema })
  .passthrough();

const successSchema = z
  .object({ jsonrpc: z.literal('2.0'), id: idSchema.nullable(), result: z.unknown() })
  .passthrough();

export const toolDescriptorSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    inputSchema: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const toolCallParamsSchema = z
  .object({
    name: z.string().min(1, 'tool name required'),
    arguments: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const broadcastParamsSchema = z.object({
  method: z.string().min(1, 'method required'),
  params: z.unknown().optional(),
});

const targetSchema = z.object({
  _meta: z.object({ server_id: z.string().min(1) }).passthrough(),
});

const toolsResultSchema = z.object({ tools: z.array(z.unknown()) });

const serverInfoSchema = z.object({ protocolVersion: z.string() }).passthrough();

const initializeParamsSchema = z.object({ protocolVersion: z.string().min(1) }).passthrough();

// ---------- Classification ----------
export type InboundMessage =
  | { kind: 'request'; message: JsonRpcRequest }
  | { kind: 'notification'; message: JsonRpcNotification }
  | { kind: 'response'; message: JsonRpcResponse }
  | { kind: 'invalid'; reason: 'parse' | 'envelope'; id: JsonRpcId; detail: string };

/**
 * Parses one inbound text frame. Never throws: frames that are not JSON or not
 * JSON-RPC 2.0 come back as `invalid` with whatever id could be recovered.
 */
export function parseMessage(raw: string): InboundMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { kind: 'invalid', reason: 'parse', id: null, detail };
  }

  const body = objectSchema.safeParse(data);
  if (!body.success) {
    return { kind: 'invalid', reason: 'envelope', id: null, detail: 'message must be a JSON object' };
  }

  if ('method' in body.data) {
    if ('id' in body.data) {
      const request = requestSchema.safeParse(body.data);
      if (request.success) return { kind: 'request', message: request.data };
      return invalidEnvelope(body.data, request.error);
    }
    const notification = notificationSchema.safeParse(body.data);
    if (notification.success) return { kind: 'notification', message: notification.data };
    return invalidEnvelope(body.data, notification.error);
  }

  if ('error' in body.data) {
    const failure = failureSchema.safeParse(body.data);
    if (failure.success) return { kind: 'response', message: failure.data };
    return invalidEnvelope(body.data, failure.error);
  }

  if ('result' in body.data) {
    const success = successSchema.safeParse(body.data);
    if (success.success) {
      return { kind: 'response', message: { ...success.data, result: success.data.result } };
    }
    return invalidEnvelope(body.data, success.error);
  }

  return invalidEnvelope(body.data);
}

function invalidEnvelope(data: Record<string, unknown>, error?: z.ZodError): InboundMessage {
  const id = idSchema.safeParse(data.id);
  const detail = error
    ? error.issues.map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`).join('; ')
    : 'message has neither method nor result/error';
  return { kind: 'invalid', reason: 'envelope', id: id.success ? id.data : null, detail };
}

// ---------- Payload helpers ----------

/** Provider target named in `params._meta.server_id`, if any. */
export function explicitTarget(params: unknown): ServerId | undefined {
  const parsed = targetSchema.safeParse(params);
  return parsed.success ? parsed.data._meta.server_id : undefined;
}

/**
 * Extracts the tool list from a `tools/list` style result. Returns null when the
 * result carries no `tools` array; malformed descriptors are counted in `skipped`.
 */
export function readToolList(result: unknown): { tools: ToolDescriptor[]; skipped: number } | null {
  const parsed = toolsResultSchema.safeParse(result);
  if (!parsed.success) return null;

  const tools: ToolDescriptor[] = [];
  let skipped = 0;
  for (const candidate of parsed.data.tools) {
    const tool = toolDescriptorSchema.safeParse(candidate);
    if (tool.success) tools.push(tool.data);
    else skipped += 1;
  }
  return { tools, skipped };
}

/** The `initialize` result of a provider, recognised by its `protocolVersion`. */
export function readServerInfo(result: unknown): Record<string, unknown> | null {
  const parsed = serverInfoSchema.safeParse(result);
  return parsed.success ? parsed.data : null;
}

/** Protocol version a client asked for in `initialize`, if it named one. */
export function requestedProtocolVersion(params: unknown): string | undefined {
  const parsed = initializeParamsSchema.safeParse(params);
  return parsed.success ? parsed.data.protocolVersion : undefined;
}
