import { ValidationError } from '../errors';

export type JsonBody = Record<string, unknown>;

// Parses a JSON object body; anything else is a client error
export async function readJsonBody(request: Request): Promise<JsonBody> {
  let parsed: unknown;
  try {
    const text = await request.text();
    parsed = text.trim() === '' ? {} : JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function optionalString(body: JsonBody, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`Field '${field}' must be a string`);
  }
  return value;
}

export function stringList(body: JsonBody, field: string): string[] | string | undefined {
  const value = body[field];
  if (value === undefined || value === null || typeof value === 'string') return value ?? undefined;
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new ValidationError(`Field '${field}' must be a string or a list of strings`);
}
