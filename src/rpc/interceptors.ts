/**
 * The interceptor chain every unary call runs through:
 * logging, then authenticate, resolve entity context, authorize.
 */

import { resolvePermissions } from '../auth/permissions';
import { ClaimsValidator } from '../auth/token-validator';
import { EntityContext, RequestContexts, parseUuid } from '../domain/context';
import { StatusCode, invalidArgument, permissionDenied, statusError, toRpcError } from '../domain/errors';
import { UserPermissions, isProjectAdmin } from '../domain/user';
import { Querier } from '../storage/store';
import { CallContext } from './call-context';
import { UnaryCall } from './policy';

export type Next = (ctx: CallContext) => Promise<unknown>;

export type Interceptor = (ctx: CallContext, call: UnaryCall, next: Next) => Promise<unknown>;

/** Compose interceptors, outermost first, around the call itself. */
export function chainInterceptors(interceptors: readonly Interceptor[], call: UnaryCall): Next {
  return interceptors.reduceRight<Next>(
    (next, interceptor) => (ctx) => interceptor(ctx, call, next),
    (ctx) => call.run(ctx),
  );
}

const SERVER_SIDE_CODES: readonly StatusCode[] = ['Internal', 'Unknown', 'Unavailable'];

/** Records method, resulting code and duration. Errors leave as RpcError. */
export function loggingInterceptor(): Interceptor {
  return async (ctx, _call, next) => {
    const start = Date.now();
    try {
      const result = await next(ctx);
      if (!ctx.options.noLog) {
        ctx.logger.info('rpc completed', { code: 'OK', durationMs: Date.now() - start });
      }
      return result;
    } catch (err) {
      const rpcError = toRpcError(err);
      const fields = { code: rpcError.code, durationMs: Date.now() - start, error: rpcError.message };
      if (SERVER_SIDE_CODES.includes(rpcError.code)) {
        ctx.logger.error('rpc failed', fields);
      } else {
        ctx.logger.info('rpc rejected', fields);
      }
      throw rpcError;
    }
  };
}

function bearerToken(ctx: CallContext): string | null {
  const header = ctx.metadata.authorization;
  if (!header) return null;
  const match = /^bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : null;
}

/** Stage A: claims and permissions. */
export function authenticationInterceptor(deps: { validator: ClaimsValidator; store: Querier }): Interceptor {
  return async (ctx, _call, next) => {
    if (ctx.options.anonymous) {
      if (!ctx.options.noLog) ctx.logger.debug('bypassing authentication');
      return next(ctx);
    }

    const token = bearerToken(ctx);
    if (token === null) throw statusError('Unauthenticated', 'no auth token');
    const claims = deps.validator.parseAndValidate(token);

    let permissions: UserPermissions;
    try {
      permissions = await resolvePermissions(deps.store, claims);
    } catch (err) {
      throw statusError('Unknown', 'error resolving user permissions', err);
    }

    if (ctx.options.rootAdminOnly && !permissions.isSuperadmin) {
      throw permissionDenied('user is not authorized to perform this operation');
    }
    return next(ctx.withAuth(claims, permissions));
  };
}

/**
 * Picks the target project: a v2 project id wins, then an explicit v1
 * project, then the caller's only project.
 */
export function resolveProjectId(contexts: RequestContexts, permissions: UserPermissions): string {
  const v2Project = contexts.v2?.projectId ?? '';
  if (v2Project !== '') {
    const id = parseUuid(v2Project);
    if (id === null) throw invalidArgument('malformed project ID');
    return id;
  }

  if (contexts.v1 === undefined || contexts.v1 === null) {
    throw invalidArgument('context cannot be nil');
  }

  const v1Project = contexts.v1.project ?? '';
  if (v1Project !== '') {
    const id = parseUuid(v1Project);
    if (id === null) throw invalidArgument('malformed project ID');
    return id;
  }

  if (permissions.projectIds.length === 1) return permissions.projectIds[0];
  throw invalidArgument('cannot get default project');
}

/** Stage B: attaches the entity context to project-scoped calls. */
export function entityContextInterceptor(): Interceptor {
  return async (ctx, call, next) => {
    if (ctx.options.anonymous || ctx.options.targetResource !== 'project') {
      if (!ctx.options.noLog) ctx.logger.debug('bypassing entity context resolution');
      return next(ctx);
    }
    if (!call.contexts) {
      throw statusError('Internal', `${ctx.method} targets a project but its request carries no context`);
    }

    const entity: EntityContext = {
      project: { id: resolveProjectId(call.contexts, ctx.requirePermissions()) },
      provider: { name: call.contexts.v1?.provider ?? '' },
    };
    return next(ctx.withEntity(entity));
  };
}

/** Stage C: the caller must be a member, or an admin for owner-only methods. */
export function authorizationInterceptor(): Interceptor {
  return async (ctx, _call, next) => {
    if (ctx.options.anonymous || ctx.options.targetResource !== 'project') {
      if (!ctx.options.noLog) ctx.logger.debug('bypassing project authorization');
      return next(ctx);
    }

    const permissions = ctx.requirePermissions();
    if (permissions.isSuperadmin) return next(ctx);

    const projectId = ctx.requireEntity().project.id;
    if (!permissions.projectIds.includes(projectId)) {
      throw permissionDenied('user is not authorized to access this project');
    }
    if (ctx.options.ownerOnly && !isProjectAdmin(permissions, projectId)) {
      throw permissionDenied('user is not an administrator on this project');
    }
    return next(ctx);
  };
}
