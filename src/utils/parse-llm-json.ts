import { jsonrepair } from 'jsonrepair';

/**
 * Cuts the outermost `{ ... }` out of a model reply, dropping prose or
 * code fences around it. Returns null when the reply holds no object.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) {
    return null;
  }
  return text.slice(start, end + 1);
}

/**
 * Parses the JSON object in an LLM reply.
 *
 * jsonrepair takes care of the usual damage: trailing commas, comments,
 * single quotes, unquoted keys and truncated output.
 *
 * @throws Error if no object can be extracted or repaired
 */
export function parseLlmJson(text: string): unknown {
  const candidate = extractJsonObject(text);
  if (candidate === null) {
    throw new Error(
      `No JSON object found in response: ${text.substring(0, 200)}`,
    );
  }

  try {
    return JSON.parse(jsonrepair(candidate)) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(
      `Failed to repair and parse JSON: ${message}\n\n` +
        `Input text: ${candidate.substring(0, 700)}...`,
    );
  }
}
