import { z } from 'zod';
import type { TokenResolver } from '../contracts/auth';
import type { AgentId } from '../types';

const tokenSchema = z.object({
  agentId: z.string().min(1, 'agentId required'),
});

/**
 * Default resolver: the token is a JSON object `{"agentId": "..."}`, possibly
 * still percent-encoded when the query string was encoded twice.
 */
export class JsonTokenResolver implements TokenResolver {
  async resolve(token: string): Promise<AgentId | null> {
    const body = parseJson(token) ?? parseJson(safeDecode(token));
    if (typeof body === 'undefined') return null;
    const parsed = tokenSchema.safeParse(body);
    return parsed.success ? parsed.data.agentId : null;
  }
}

function parseJson(text: string | undefined): unknown {
  if (typeof text === 'undefined') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function safeDecode(text: string): string | undefined {
  try {
    return decodeURIComponent(text);
  } catch {
    return undefined;
  }
}
