import { ApiError } from '../shared/errors.js';

export const GRAPH_BASE = 'https://graph.microsoft.com/v1.0';
export const ARM_BASE = 'https://management.azure.com';
export const ARM_API_VERSION = '2020-10-01';

export type TokenProvider = () => Promise<string>;

interface ProviderErrorBody {
  error?: { code?: string; message?: string };
}

function isProviderErrorBody(value: unknown): value is ProviderErrorBody {
  return typeof value === 'object' && value !== null && 'error' in value;
}

async function toApiError(response: Response): Promise<ApiError> {
  const text = await response.text();
  let code: string | null = null;
  let message = text || response.statusText;
  try {
    const body: unknown = JSON.parse(text);
    if (isProviderErrorBody(body) && body.error) {
      code = body.error.code ?? null;
      message = body.error.message ?? message;
    }
  } catch {
    // Not JSON; keep the raw text as the message.
  }
  return new ApiError(response.status, code, message);
}

export interface JsonRequest {
  method?: 'GET' | 'POST' | 'PUT';
  body?: unknown;
}

export async function requestJson<T>(
  url: string,
  token: TokenProvider,
  req: JsonRequest = {},
): Promise<T> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${await token()}`,
    Accept: 'application/json',
  };
  const init: RequestInit = { method: req.method ?? 'GET', headers };
  if (req.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    init.body = JSON.stringify(req.body);
  }

  const response = await fetch(url, init);
  if (!response.ok) throw await toApiError(response);

  return await response.json() as T;
}

/** Follows `@odata.nextLink` / `nextLink` pages until exhausted. */
export async function requestAllPages<T>(url: string, token: TokenProvider): Promise<T[]> {
  const items: T[] = [];
  let next: string | undefined = url;
  while (next) {
    const page: { value?: T[]; '@odata.nextLink'?: string; nextLink?: string } =
      await requestJson(next, token);
    items.push(...(page.value ?? []));
    next = page['@odata.nextLink'] ?? page.nextLink;
  }
  return items;
}
