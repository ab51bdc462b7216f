import { UserId, UserRole } from '../domain-types';
import { WorkflowError } from '../domain/workflow-error';
import { UserRecord } from './workflow-store';

type UserLookup = { findUser(userId: UserId): Promise<UserRecord | null> };

// Resolves the acting user and checks they may perform an operation reserved to `roles`.
export async function requireActor(
  db: UserLookup,
  userId: UserId,
  roles: UserRole | readonly UserRole[]
): Promise<UserRecord> {
  const allowed: readonly UserRole[] = typeof roles === 'string' ? [roles] : roles;
  const actor = await db.findUser(userId);

  if (!actor || !actor.isActive) {
    throw WorkflowError.forbidden('inactive_actor', 'Acting user is unknown or inactive', { userId });
  }
  if (!allowed.includes(actor.role)) {
    throw WorkflowError.forbidden('role_required', `Operation requires role ${allowed.join(' or ')}`, {
      userId,
      role: actor.role,
      requiredRoles: allowed,
    });
  }
  return actor;
}
