import { ValidationError } from '@expensox/shared';

/**
 * The path segment after `collection`, e.g. the expense id in
 * `/api/v1/expenses/{id}/submit`.
 */
export function extractId(request: Request, collection: string): string {
  const segments = new URL(request.url).pathname.split('/').filter(Boolean);
  const index = segments.indexOf(collection);
  const id = index >= 0 ? segments[index + 1] : undefined;
  if (!id) {
    throw new ValidationError('Validation failed', [
      { field: 'id', message: `Missing ${collection} id in path` },
    ]);
  }
  return decodeURIComponent(id);
}

/** JSON object body; an empty body reads as `{}`. */
export async function readJsonObject(request: Request): Promise<Record<string, unknown>> {
  const text = await request.text();
  if (!text.trim()) return {};

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ValidationError('Validation failed', [
      { field: 'body', message: 'Request body must be valid JSON' },
    ]);
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Validation failed', [
      { field: 'body', message: 'Request body must be a JSON object' },
    ]);
  }
  return { ...body };
}

export function searchParams(request: Request): URLSearchParams {
  return new URL(request.url).searchParams;
}

/** Absent or empty parameters read as undefined so schema defaults apply. */
export function optionalParam(params: URLSearchParams, name: string): string | undefined {
  return params.get(name) || undefined;
}

export function parseBoolean(value: string | null): boolean | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}
