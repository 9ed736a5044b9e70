import type { ValidateFunction } from 'ajv';
import { getConfig } from './config';
import { ApiError, UnauthorizedError, describeError } from './errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * What an authorized client needs from the local configuration.
 */
export interface CredentialSource {
  getRailwayToken(): string | undefined;
  getRailwayAuthToken(): string | undefined;
  getBackboard(): string;
  readonly fetch: FetchLike;
  readonly version: string;
}

export interface GQLClient {
  endpoint: string;
  headers: Record<string, string>;
  fetch: FetchLike;
}

/**
 * Build a GraphQL client for the backboard API. A project-scoped token wins
 * over the user's auth token; having neither is an error.
 */
export function createAuthorizedClient(source: CredentialSource): GQLClient {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': `cli-${source.version}`,
  };

  const projectToken = source.getRailwayToken();
  const authToken = source.getRailwayAuthToken();
  if (projectToken) {
    headers['project-access-token'] = projectToken;
  } else if (authToken) {
    headers['Authorization'] = `Bearer ${authToken}`;
  } else {
    throw new UnauthorizedError();
  }

  return { endpoint: source.getBackboard(), headers, fetch: source.fetch };
}

function logRequest(method: string, url: string): void {
  if (getConfig().verbose) {
    process.stderr.write(`[${method}] ${url}\n`);
  }
}

function graphqlErrorMessages(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('errors' in body)) return [];
  const { errors } = body;
  if (!Array.isArray(errors)) return [];
  return errors.map((e: unknown) =>
    typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string'
      ? e.message
      : 'Unknown GraphQL error'
  );
}

/**
 * POST a GraphQL query and return its `data`, checked against `isData`.
 */
export async function postGraphql<T>(
  client: GQLClient,
  query: string,
  variables: Record<string, unknown>,
  isData: ValidateFunction<T>
): Promise<T> {
  logRequest('POST', client.endpoint);

  let res: Response;
  try {
    res = await client.fetch(client.endpoint, {
      method: 'POST',
      headers: client.headers,
      body: JSON.stringify({ query, variables }),
    });
  } catch (err) {
    throw new ApiError(0, 'CONNECTION_FAILED', `Could not connect to ${client.endpoint} (${describeError(err)})`);
  }

  const body: unknown = await res.json().catch(() => ({}));

  const messages = graphqlErrorMessages(body);
  if (messages.length > 0) {
    throw new ApiError(res.status, 'GRAPHQL_ERROR', messages.join('; '));
  }
  if (!res.ok) {
    throw new ApiError(res.status, 'HTTP_ERROR', `HTTP ${res.status}`);
  }

  const data = typeof body === 'object' && body !== null && 'data' in body ? body.data : undefined;
  if (!isData(data)) {
    throw new ApiError(res.status, 'INVALID_RESPONSE', `Unexpected response shape from ${client.endpoint}`);
  }
  return data;
}
