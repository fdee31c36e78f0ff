import { logger } from '../../utils/logger.js';
import type { StructuredResult } from './LLMService.interface.js';

export const STRUCTURED_FALLBACK_ERROR = 'Failed to generate structured response';

export type ParsedJson = { ok: true; data: unknown } | { ok: false; reason: string };

export function stripCodeFences(text: string): string {
  let body = text.trim();

  if (body.startsWith('```json')) {
    body = body.slice('```json'.length);
  } else if (body.startsWith('```')) {
    body = body.slice('```'.length);
  } else {
    return body;
  }

  body = body.trimEnd();
  if (body.endsWith('```')) {
    body = body.slice(0, -'```'.length);
  }

  return body.trim();
}

export function parseJsonResponse(text: string): ParsedJson {
  try {
    return { ok: true, data: JSON.parse(stripCodeFences(text)) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parses the JSON-mode completion; when it is not valid JSON, asks for a
 * plain completion instead and returns it alongside an error marker.
 */
export async function resolveStructured(
  requestJson: () => Promise<string>,
  fallback: () => Promise<string>,
  provider: string
): Promise<StructuredResult> {
  const raw = await requestJson();
  const parsed = parseJsonResponse(raw);

  if (parsed.ok) {
    return { ok: true, data: parsed.data };
  }

  logger.warn({ provider, reason: parsed.reason }, 'Failed to parse JSON response, falling back to text generation');
  const rawResponse = await fallback();

  return { ok: false, error: STRUCTURED_FALLBACK_ERROR, rawResponse };
}
