import { PermissionError } from '../errors';
import { User, UserRole } from '../types';

export type Capability = 'submission:review' | 'document:supersede' | 'group:manage' | 'user:manage';

export interface Role {
  name: UserRole;
  description: string;
  capabilities: ReadonlySet<Capability>;
}

export const ROLES: Readonly<Record<UserRole, Role>> = {
  member: {
    name: 'member',
    description: 'Submits drafts, comments on and follows published documents',
    capabilities: new Set<Capability>()
  },
  editor: {
    name: 'editor',
    description: 'Reviews submissions and approves or rejects them',
    capabilities: new Set<Capability>(['submission:review'])
  },
  chair: {
    name: 'chair',
    description: 'Working group chair; reviews submissions, retires documents and charters groups',
    capabilities: new Set<Capability>(['submission:review', 'document:supersede', 'group:manage'])
  },
  admin: {
    name: 'admin',
    description: 'System administrator with full permissions',
    capabilities: new Set<Capability>(['submission:review', 'document:supersede', 'group:manage', 'user:manage'])
  }
};

export const getRole = (role: UserRole): Role => ROLES[role];

export const hasCapability = (role: UserRole, capability: Capability): boolean =>
  ROLES[role].capabilities.has(capability);

export function assertActive(actor: User): void {
  if (!actor.active) {
    throw new PermissionError('This account has been deactivated');
  }
}

export function authorize(actor: User, capability: Capability): void {
  assertActive(actor);
  if (!hasCapability(actor.role, capability)) {
    throw new PermissionError(`Role '${actor.role}' may not perform '${capability}'`);
  }
}
