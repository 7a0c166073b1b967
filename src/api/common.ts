/**
 * Request pieces shared by the service method tables.
 */

import { z } from 'zod';
import { RequestContexts } from '../domain/context';
import { Provider } from '../domain/provider';
import { resolveProvider } from '../providers/resolver';
import { CallContext } from '../rpc/call-context';
import { Store } from '../storage/store';
import { InvitationService } from '../services/invitations';
import { ProfileService } from '../services/profiles';
import { ProjectService } from '../services/projects';
import { RuleTypeService } from '../services/rule-types';
import { UserService } from '../services/users';

export const RPC_PACKAGE = 'rampart.v1';

export function methodName(service: string, method: string): string {
  return `${RPC_PACKAGE}.${service}/${method}`;
}

/** What the method tables call into. */
export interface Services {
  store: Store;
  ruleTypes: RuleTypeService;
  profiles: ProfileService;
  projects: ProjectService;
  users: UserService;
  invitations: InvitationService;
}

export const ContextV1Schema = z.object({
  project: z.string().optional(),
  provider: z.string().optional(),
});

export const ContextV2Schema = z.object({
  projectId: z.string().default(''),
});

/** Fields every project-scoped request may carry. */
export const projectScoped = {
  context: ContextV1Schema.nullish(),
  contextV2: ContextV2Schema.optional(),
};

export function contextsOf(request: {
  context?: z.infer<typeof ContextV1Schema> | null;
  contextV2?: z.infer<typeof ContextV2Schema>;
}): RequestContexts {
  return { v1: request.context, v2: request.contextV2 };
}

/** The provider a project-scoped call acts through. */
export async function providerFor(services: Services, ctx: CallContext): Promise<Provider> {
  const entity = ctx.requireEntity();
  return resolveProvider(services.store.providers, entity.project.id, entity.provider.name);
}

/** Empty response body. */
export type Empty = Record<string, never>;

export const EMPTY: Empty = {};
