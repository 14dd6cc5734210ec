import { ApiError, AuthenticationError, errorMessage } from '../shared/errors.js';
import { GRAPH_BASE, requestJson, type TokenProvider } from './http.js';

export interface AuthenticatedSession {
  principalId: string;
  graphToken: TokenProvider;
  armToken: TokenProvider;
}

export interface SessionEnv {
  GRAPH_ACCESS_TOKEN?: string;
  ARM_ACCESS_TOKEN?: string;
}

/**
 * Builds a session from bearer tokens obtained elsewhere (e.g. the platform
 * CLI's `get-access-token`). Resolving `/me` doubles as the connectivity check.
 */
export async function createSessionFromEnv(env: SessionEnv): Promise<AuthenticatedSession> {
  const graph = env.GRAPH_ACCESS_TOKEN ?? '';
  const arm = env.ARM_ACCESS_TOKEN ?? '';
  if (!graph) {
    throw new AuthenticationError('GRAPH_ACCESS_TOKEN is not set');
  }

  const graphToken: TokenProvider = async () => graph;
  const armToken: TokenProvider = async () => {
    if (!arm) throw new AuthenticationError('ARM_ACCESS_TOKEN is not set');
    return arm;
  };

  let me: { id?: string };
  try {
    me = await requestJson<{ id?: string }>(`${GRAPH_BASE}/me?$select=id`, graphToken);
  } catch (err) {
    const detail = err instanceof ApiError ? `${err.status} ${err.message}` : errorMessage(err);
    throw new AuthenticationError(`Cannot resolve signed-in principal: ${detail}`);
  }
  if (!me.id) throw new AuthenticationError('Signed-in principal has no id');

  return { principalId: me.id, graphToken, armToken };
}
