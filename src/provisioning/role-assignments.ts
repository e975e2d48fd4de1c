import type { ResourceManagerClient, RoleAssignmentRequest } from '../clients/types.js';
import { errorCodeOf, statusCodeOf } from '../utils/errors.js';

export const ROLE_VM_USER_LOGIN = 'Virtual Machine User Login';
export const ROLE_VM_ADMIN_LOGIN = 'Virtual Machine Administrator Login';
export const ROLE_DESKTOP_USER = 'Desktop Virtualization User';

export interface RoleAssignmentTarget {
  scope: string;
  principalId: string;
  roleName: string;
  principalType?: RoleAssignmentRequest['principalType'];
}

export type AssignmentOutcome = 'created' | 'existing';

/**
 * Role definition ids differ in prefix (subscription-scoped vs tenant-scoped);
 * the trailing GUID identifies the role
 */
export function roleDefinitionGuid(roleDefinitionId: string): string {
  const segments = roleDefinitionId.split('/').filter(Boolean);
  return (segments[segments.length - 1] ?? '').toLowerCase();
}

export function sameScope(a: string, b: string): boolean {
  const normalize = (s: string) => s.replace(/\/+$/, '').toLowerCase();
  return normalize(a) === normalize(b);
}

/**
 * Add a role assignment unless the (principal, role, scope) triple already exists
 */
export async function ensureRoleAssignment(
  resources: ResourceManagerClient,
  target: RoleAssignmentTarget
): Promise<AssignmentOutcome> {
  const roleDefinitionId = await resources.getRoleDefinitionId(target.scope, target.roleName);
  const wanted = roleDefinitionGuid(roleDefinitionId);

  const existing = await resources.listRoleAssignments(target.scope);
  const present = existing.some(a =>
    a.principalId === target.principalId &&
    roleDefinitionGuid(a.roleDefinitionId) === wanted &&
    sameScope(a.scope, target.scope)
  );
  if (present) return 'existing';

  try {
    await resources.createRoleAssignment({
      scope: target.scope,
      principalId: target.principalId,
      roleDefinitionId,
      principalType: target.principalType ?? 'Group',
    });
    return 'created';
  } catch (error) {
    if (errorCodeOf(error) === 'RoleAssignmentExists' || statusCodeOf(error) === 409) {
      return 'existing';
    }
    throw error;
  }
}

export function resourceGroupScope(subscriptionId: string, resourceGroupName: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroupName}`;
}

/**
 * Fixed role grants made after the core deployment
 */
export function coreRoleAssignments(
  rgScope: string,
  appGroupScope: string,
  userGroupId: string,
  adminGroupId: string
): RoleAssignmentTarget[] {
  return [
    { scope: rgScope, principalId: userGroupId, roleName: ROLE_VM_USER_LOGIN },
    { scope: rgScope, principalId: adminGroupId, roleName: ROLE_VM_ADMIN_LOGIN },
    { scope: rgScope, principalId: userGroupId, roleName: ROLE_DESKTOP_USER },
    { scope: rgScope, principalId: adminGroupId, roleName: ROLE_DESKTOP_USER },
    { scope: appGroupScope, principalId: userGroupId, roleName: ROLE_DESKTOP_USER },
    { scope: appGroupScope, principalId: adminGroupId, roleName: ROLE_DESKTOP_USER },
  ];
}
