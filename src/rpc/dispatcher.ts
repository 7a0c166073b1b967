/**
 * Routes a decoded call through the interceptor chain to its handler.
 */

import { notFound } from '../domain/errors';
import { Logger } from '../logger';
import { CallContext, Metadata } from './call-context';
import { Interceptor, chainInterceptors } from './interceptors';
import { Method, PolicyIndex } from './policy';

export interface CallInit {
  metadata: Metadata;
  signal: AbortSignal;
  logger: Logger;
}

export class RpcDispatcher {
  readonly policy: PolicyIndex;
  private readonly methods: ReadonlyMap<string, Method>;

  constructor(
    methods: readonly Method[],
    private readonly interceptors: readonly Interceptor[],
  ) {
    this.policy = PolicyIndex.build(methods);
    this.methods = new Map(methods.map((m) => [m.fullName, m]));
  }

  methodNames(): string[] {
    return [...this.methods.keys()];
  }

  async dispatch(fullName: string, body: unknown, init: CallInit): Promise<unknown> {
    const method = this.methods.get(fullName);
    if (!method) throw notFound(`unknown method ${fullName}`);

    const call = method.prepare(body);
    const ctx = new CallContext(
      fullName,
      this.policy.lookup(fullName),
      init.metadata,
      init.signal,
      init.logger.child({ method: fullName }),
    );
    return chainInterceptors(this.interceptors, call)(ctx);
  }
}
