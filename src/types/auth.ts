/**
 * Actor Types
 *
 * Every service method receives the actor performing the action.
 * Users are identified by their numeric chat-platform id.
 */

export interface ActorContext {
  type: 'user' | 'admin' | 'system' | 'anonymous';
  userId?: number;
  requestId: string;
  permissions: string[];
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for background jobs (sweeper, reminders)
 * Has all permissions - use with caution
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
  permissions: ['*'],
};

export const ADMIN_PERMISSIONS = ['admin:*'];

/**
 * Administrators and the system actor bypass ownership checks
 */
export function isPrivilegedActor(actor: ActorContext): boolean {
  return (
    actor.type === 'admin' ||
    actor.type === 'system' ||
    actor.permissions.includes('*') ||
    actor.permissions.includes('admin:*')
  );
}

/**
 * Owner or privileged actor
 */
export function canActFor(actor: ActorContext, ownerId: number): boolean {
  return isPrivilegedActor(actor) || actor.userId === ownerId;
}
