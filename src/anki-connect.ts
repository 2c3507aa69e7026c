import { z } from 'zod';

export const DEFAULT_ANKI_CONNECT_URL = 'http://127.0.0.1:8765';

/**
 * AnkiConnect endpoint, overridable through ANKI_CONNECT_URL.
 */
export function getAnkiConnectUrl(): string {
  return process.env.ANKI_CONNECT_URL || DEFAULT_ANKI_CONNECT_URL;
}

// Generic response schema
export function AnkiConnectResponse<T extends z.ZodTypeAny>(resultSchema: T) {
  return z.object({
    result: resultSchema.nullable(),
    error: z.string().nullable(),
  });
}

// Common schemas
export const NoteField = z.object({
  value: z.string(),
  order: z.number(),
});

export const NoteInfo = z.object({
  noteId: z.number(),
  fields: z.record(z.string(), NoteField.optional()),
  tags: z.array(z.string()),
  modelName: z.string(),
});

export const CardInfo = z.object({
  cardId: z.number(),
  note: z.number().optional(),
  deckName: z.string(),
  due: z.number(),
  modelName: z.string().optional(),
  fields: z.record(z.string(), NoteField.optional()).optional(),
  question: z.string().optional(),
});

export const CurrentCard = z.object({
  cardId: z.number(),
  deckName: z.string(),
  modelName: z.string(),
  question: z.string(),
  fields: z.record(z.string(), NoteField.optional()),
});

async function postAction(
  action: string,
  params: Record<string, unknown>,
): Promise<unknown> {
  const payload = { action, params, version: 6 };
  const url = getAnkiConnectUrl();

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Network error: Could not connect to AnkiConnect at ${url}. Is Anki running? Details: ${details}`,
    );
  }

  if (!response.ok) {
    throw new Error(`HTTP error! status: ${response.status}`);
  }

  return (await response.json()) as unknown;
}

function unwrap<R>(
  action: string,
  responseJson: unknown,
  resultSchema: z.ZodType<R>,
): R | null {
  try {
    const validated = AnkiConnectResponse(resultSchema).parse(responseJson);
    if (validated.error) {
      throw new Error(`AnkiConnect API error: ${validated.error}`);
    }
    return validated.result;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Zod validation error:', z.flattenError(error));
      throw new Error(`AnkiConnect response validation failed (${action}).`);
    }
    throw error;
  }
}

/**
 * Helper function to send requests to AnkiConnect with schema validation.
 * A null result is an error; use {@link ankiRequestNullable} for actions
 * that legitimately return null.
 */
export async function ankiRequest<
  R,
  P extends Record<string, unknown> = Record<string, never>,
>(action: string, resultSchema: z.ZodType<R>, params?: P): Promise<R> {
  const responseJson = await postAction(action, params ?? {});
  const result = unwrap(action, responseJson, resultSchema);
  if (result === null) {
    throw new Error(`AnkiConnect returned null result for action: ${action}`);
  }
  return result;
}

/**
 * Same as ankiRequest, but passes a null result through. Write actions such
 * as updateNote and updateNoteFields answer with null on success, and
 * guiCurrentCard does when no card is shown.
 */
export async function ankiRequestNullable<
  R,
  P extends Record<string, unknown> = Record<string, never>,
>(
  action: string,
  resultSchema: z.ZodType<R>,
  params?: P,
): Promise<R | null> {
  const responseJson = await postAction(action, params ?? {});
  return unwrap(action, responseJson, resultSchema);
}

/**
 * Flattens AnkiConnect's `{ Field: { value, order } }` map into plain values,
 * in field order.
 */
export function fieldValues(
  fields: Record<string, z.infer<typeof NoteField> | undefined>,
): Record<string, string> {
  const entries = Object.entries(fields).flatMap(([name, field]) =>
    field ? [{ name, ...field }] : [],
  );
  entries.sort((a, b) => a.order - b.order);

  const values: Record<string, string> = {};
  for (const entry of entries) {
    values[entry.name] = entry.value;
  }
  return values;
}
