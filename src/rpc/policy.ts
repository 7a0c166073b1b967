/**
 * RPC methods and their access policy.
 *
 * Every service declares its methods with defineMethod(). The policy
 * index is built once from those declarations at start-up and is
 * read-only afterwards.
 */

import { z } from 'zod';
import { RequestContexts } from '../domain/context';
import { invalidArgument } from '../domain/errors';
import { CallContext } from './call-context';

export type TargetResource = 'none' | 'user' | 'project';

export interface RpcOptions {
  /** No token is read and every check but logging is skipped. */
  anonymous: boolean;
  /** Suppresses the per-call success log line. */
  noLog: boolean;
  targetResource: TargetResource;
  /** Requires an admin role binding on the target project. */
  ownerOnly: boolean;
  /** Requires the superadmin realm role. */
  rootAdminOnly: boolean;
}

export const DEFAULT_RPC_OPTIONS: Readonly<RpcOptions> = Object.freeze({
  anonymous: false,
  noLog: false,
  targetResource: 'none',
  ownerOnly: false,
  rootAdminOnly: false,
});

/** A decoded request, ready to run. */
export interface UnaryCall {
  /** Present when the request type can name a project. */
  readonly contexts?: RequestContexts;
  run(ctx: CallContext): Promise<unknown>;
}

export interface Method {
  readonly fullName: string;
  /** Undefined when the method declares no policy. */
  readonly options?: Readonly<RpcOptions>;
  /** Decode a JSON body; throws InvalidArgument. */
  prepare(body: unknown): UnaryCall;
}

export interface MethodDefinition<Req, Res> {
  fullName: string;
  options?: Partial<RpcOptions>;
  request: z.ZodType<Req, z.ZodTypeDef, unknown>;
  /** The request's project-context accessor. */
  contextOf?: (request: Req) => RequestContexts;
  handler: (ctx: CallContext, request: Req) => Promise<Res>;
}

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path === '' ? issue.message : `${path}: ${issue.message}`;
}

export function defineMethod<Req, Res>(definition: MethodDefinition<Req, Res>): Method {
  const options = definition.options ? Object.freeze({ ...DEFAULT_RPC_OPTIONS, ...definition.options }) : undefined;
  return {
    fullName: definition.fullName,
    options,
    prepare(body: unknown): UnaryCall {
      const parsed = definition.request.safeParse(body ?? {});
      if (!parsed.success) {
        throw invalidArgument(`invalid request: ${describeIssue(parsed.error.issues[0])}`);
      }
      const request = parsed.data;
      return {
        contexts: definition.contextOf ? definition.contextOf(request) : undefined,
        run: (ctx) => definition.handler(ctx, request),
      };
    },
  };
}

/** Method name to policy. Lookups of unknown names get the defaults. */
export class PolicyIndex {
  private constructor(private readonly entries: ReadonlyMap<string, Readonly<RpcOptions>>) {}

  /** Throws if two methods share a name. */
  static build(methods: readonly Method[]): PolicyIndex {
    const entries = new Map<string, Readonly<RpcOptions>>();
    const seen = new Set<string>();
    for (const method of methods) {
      if (seen.has(method.fullName)) {
        throw new Error(`duplicate RPC method ${method.fullName}`);
      }
      seen.add(method.fullName);
      if (method.options) entries.set(method.fullName, method.options);
    }
    return new PolicyIndex(entries);
  }

  lookup(fullName: string): Readonly<RpcOptions> {
    return this.entries.get(fullName) ?? DEFAULT_RPC_OPTIONS;
  }

  has(fullName: string): boolean {
    return this.entries.has(fullName);
  }
}
