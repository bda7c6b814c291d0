import { FetchFailureError } from './errors';

export interface JsonResponse {
  ok: boolean;
  status: number;
  body: unknown;
}

/**
 * GET a JSON document, aborting after `timeoutMs`. Network errors, timeouts and
 * unparseable bodies reject with `FetchFailureError`; HTTP error statuses do not,
 * so callers can read the error payload.
 */
export async function getJson(url: string, timeoutMs: number): Promise<JsonResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    let res: Response;
    try {
      res = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
    } catch (err) {
      throw failure(controller, timeoutMs, 'Network request failed', err);
    }

    try {
      return { ok: res.ok, status: res.status, body: await res.json() };
    } catch (err) {
      throw failure(controller, timeoutMs, 'Response was not valid JSON', err, res.status);
    }
  } finally {
    clearTimeout(timer);
  }
}

function failure(
  controller: AbortController,
  timeoutMs: number,
  message: string,
  cause: unknown,
  status?: number
): FetchFailureError {
  if (controller.signal.aborted) {
    return new FetchFailureError(`Request timed out after ${timeoutMs}ms`, { status, cause });
  }
  return new FetchFailureError(message, { status, cause });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
