import { AutoRouter, json } from 'itty-router';
import { withAuth, withCapability, currentUser } from '../authWrappers';
import { Env } from '../utils/sessionManager';
import { readJsonBody, optionalString } from '../utils/requestBody';
import { errorResponse, ValidationError } from '../errors';
import { GovernanceRequest } from '../types';
import {
  deactivateUser,
  getAllUsers,
  isUserRole,
  reactivateUser,
  resolveDisplayName,
  grantRole,
  updateDisplayName
} from '../services/userService';
import { getRole } from '../services/roleService';

export const router = AutoRouter<GovernanceRequest, [Env]>({ base: '/api/users', catch: errorResponse });

// Get the current user's profile
router.get('/me', withAuth, async (request) => {
  const user = currentUser(request);
  return json({
    ...user,
    displayName: resolveDisplayName(user),
    capabilities: [...getRole(user.role).capabilities],
  });
});

router.put('/me/display-name', withAuth, async (request, env) => {
  const body = await readJsonBody(request);
  return json(await updateDisplayName(currentUser(request), optionalString(body, 'displayName') ?? '', env));
});

// Admin: list every account, active or not
router.get('/', withCapability('user:manage'), async (request, env) => json(getAllUsers(env)));

router.put('/:id/role', withCapability('user:manage'), async (request, env) => {
  const body = await readJsonBody(request);
  if (!isUserRole(body.role)) {
    throw new ValidationError(`Unknown role: ${String(body.role)}`);
  }
  return json(await grantRole(currentUser(request), request.params.id, body.role, env));
});

router.post('/:id/deactivate', withCapability('user:manage'), async (request, env) => {
  return json(await deactivateUser(currentUser(request), request.params.id, env));
});

router.post('/:id/reactivate', withCapability('user:manage'), async (request, env) => {
  return json(await reactivateUser(currentUser(request), request.params.id, env));
});
