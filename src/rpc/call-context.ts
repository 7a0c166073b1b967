/**
 * Per-call context.
 *
 * Each interceptor derives a new context instead of mutating the one it
 * received; the state it adds is only reachable through the accessors.
 */

import { Claims } from '../auth/token-validator';
import { EntityContext } from '../domain/context';
import { statusError } from '../domain/errors';
import { UserPermissions } from '../domain/user';
import { Logger } from '../logger';
import { RpcOptions } from './policy';

/** Lower-cased header names to values. */
export type Metadata = Readonly<Record<string, string>>;

interface CallState {
  claims?: Claims;
  permissions?: UserPermissions;
  entity?: EntityContext;
}

export class CallContext {
  constructor(
    readonly method: string,
    readonly options: Readonly<RpcOptions>,
    readonly metadata: Metadata,
    readonly signal: AbortSignal,
    readonly logger: Logger,
    private readonly state: Readonly<CallState> = {},
  ) {}

  get claims(): Claims | undefined {
    return this.state.claims;
  }

  get permissions(): UserPermissions | undefined {
    return this.state.permissions;
  }

  get entity(): EntityContext | undefined {
    return this.state.entity;
  }

  withAuth(claims: Claims, permissions: UserPermissions): CallContext {
    return this.derive({ claims, permissions }, { subject: claims.subject });
  }

  withEntity(entity: EntityContext): CallContext {
    return this.derive({ entity }, { projectId: entity.project.id });
  }

  requireClaims(): Claims {
    if (!this.state.claims) throw statusError('Internal', `no claims on call to ${this.method}`);
    return this.state.claims;
  }

  requirePermissions(): UserPermissions {
    if (!this.state.permissions) throw statusError('Internal', `no permissions on call to ${this.method}`);
    return this.state.permissions;
  }

  requireEntity(): EntityContext {
    if (!this.state.entity) throw statusError('Internal', `no entity context on call to ${this.method}`);
    return this.state.entity;
  }

  private derive(update: CallState, logContext: Record<string, unknown>): CallContext {
    return new CallContext(
      this.method,
      this.options,
      this.metadata,
      this.signal,
      this.logger.child(logContext),
      { ...this.state, ...update },
    );
  }
}
