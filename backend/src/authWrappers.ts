import { json } from 'itty-router';
import { GetSession, Env, sessionIdFrom } from './utils/sessionManager';
import { getUser } from './services/userService';
import { Capability, hasCapability } from './services/roleService';
import { PermissionError } from './errors';
import { GovernanceRequest, User } from './types';

async function resolveSessionUser(request: GovernanceRequest, env: Env): Promise<User | null> {
  const sessionId = sessionIdFrom(request);
  if (!sessionId) return null;

  const session = await GetSession(sessionId, env);
  if (!session) return null;

  return getUser(session.userId, env);
}

// Middleware to check if the user is authenticated
export const withAuth = async (request: GovernanceRequest, env: Env) => {
  const user = await resolveSessionUser(request, env);
  if (!user) {
    return json({ error: 'Unauthorized', kind: 'permission' }, { status: 401 });
  }
  if (!user.active) {
    return json({ error: 'This account has been deactivated', kind: 'permission' }, { status: 403 });
  }

  request.user = user;
  return undefined;
};

// Middleware factory: authenticated user whose role grants `capability`
export const withCapability = (capability: Capability) => async (request: GovernanceRequest, env: Env) => {
  const unauthorized = await withAuth(request, env);
  if (unauthorized) {
    return unauthorized;
  }
  if (request.user && !hasCapability(request.user.role, capability)) {
    return json({ error: `Unauthorized: '${capability}' access required`, kind: 'permission' }, { status: 403 });
  }
  return undefined;
};

export function currentUser(request: GovernanceRequest): User {
  if (!request.user) {
    throw new PermissionError('Authentication required');
  }
  return request.user;
}
