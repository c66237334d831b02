/**
 * Access Middleware
 * Loads the acting user and runs the subscription gate for commands.
 * Runs before the command rate limit so a blocked user sees USER_BLOCKED.
 */

import type { Context, Next } from 'hono';

import type {
  ActionClass,
  ActorContext,
  AuthorizationGrant,
  Result,
  User,
} from '../../types/index.js';
import { errorResponse } from '../utils/response.js';

interface AccessMiddlewareDeps {
  userService: {
    getUser: (actor: ActorContext, userId: number) => Promise<Result<User>>;
  };
  subscriptionService: {
    authorize: (
      user: User,
      action: ActionClass
    ) => Promise<Result<AuthorizationGrant>>;
  };
}

export function createAccessMiddleware(deps: AccessMiddlewareDeps) {
  const { userService, subscriptionService } = deps;

  return async function accessMiddleware(c: Context, next: Next) {
    const actor = c.get('actor');
    const requestId = c.get('requestId');

    if (actor.userId === undefined) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'A user is required' },
        requestId
      );
    }

    const userResult = await userService.getUser(actor, actor.userId);
    if (!userResult.success) {
      return errorResponse(c, userResult.error, requestId);
    }

    const grant = await subscriptionService.authorize(
      userResult.data,
      'command'
    );
    if (!grant.success) {
      return errorResponse(c, grant.error, requestId);
    }

    return next();
  };
}
