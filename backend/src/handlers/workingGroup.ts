import { AutoRouter, json } from 'itty-router';
import { withCapability, currentUser } from '../authWrappers';
import { Env } from '../utils/sessionManager';
import { readJsonBody, optionalString, stringList } from '../utils/requestBody';
import { errorResponse, ValidationError } from '../errors';
import { GovernanceRequest } from '../types';
import {
  concludeWorkingGroup,
  createWorkingGroup,
  isWorkingGroupState,
  listWorkingGroups,
  requireWorkingGroup
} from '../services/workingGroupService';

export const router = AutoRouter<GovernanceRequest, [Env]>({ base: '/api/groups', catch: errorResponse });

// Public registry, optionally filtered by ?state=active|concluded
router.get('/', async (request, env) => {
  const state = request.query.state;
  if (state === undefined) {
    return json(listWorkingGroups(env));
  }
  if (!isWorkingGroupState(state)) {
    throw new ValidationError(`Unknown working group state: ${String(state)}`);
  }
  return json(listWorkingGroups(env, state));
});

router.get('/:acronym', async (request, env) => json(requireWorkingGroup(request.params.acronym, env)));

router.post('/', withCapability('group:manage'), async (request, env) => {
  const body = await readJsonBody(request);
  const group = await createWorkingGroup(currentUser(request), {
    acronym: optionalString(body, 'acronym'),
    name: optionalString(body, 'name'),
    chairs: stringList(body, 'chairs'),
  }, env);
  return json(group, { status: 201 });
});

router.post('/:acronym/conclude', withCapability('group:manage'), async (request, env) => {
  return json(await concludeWorkingGroup(currentUser(request), request.params.acronym, env));
});
