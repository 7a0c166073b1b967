/**
 * Shared test fixtures: token signing, tenant seeding and error capture.
 */

import { createHmac } from 'crypto';
import { v4 as uuid } from 'uuid';
import { Claims } from '../../src/auth/token-validator';
import { RpcError } from '../../src/domain/errors';
import { Project } from '../../src/domain/project';
import { FORGE_OAUTH_IMPLEMENTS, Provider, ProviderClass } from '../../src/domain/provider';
import { Role } from '../../src/domain/rbac';
import { RuleTypeDefinition, RuleTypeInput } from '../../src/domain/rule-type';
import { User } from '../../src/domain/user';
import { Store } from '../../src/storage/store';

export const TEST_SECRET = 'test-secret';
export const FIXED_TIME = '2024-01-01T00:00:00.000Z';

function segment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

export function signHs256(
  payload: Record<string, unknown>,
  secret: string = TEST_SECRET,
  header: Record<string, unknown> = { alg: 'HS256', typ: 'JWT' },
): string {
  const signingInput = `${segment(header)}.${segment(payload)}`;
  const signature = createHmac('sha256', secret).update(signingInput).digest('base64url');
  return `${signingInput}.${signature}`;
}

/** A token valid for the next hour. */
export function tokenFor(subject: string, extra: Record<string, unknown> = {}): string {
  return signHs256({ sub: subject, exp: Math.floor(Date.now() / 1000) + 3600, ...extra });
}

export function claimsFor(subject: string, extra: Partial<Claims> = {}): Claims {
  return { subject, realmRoles: [], raw: { sub: subject }, ...extra };
}

export interface Tenant {
  user: User;
  project: Project;
  provider: Provider;
  providers: Provider[];
}

export interface TenantOptions {
  subject?: string;
  projectId?: string;
  projectName?: string;
  parentId?: string;
  providerNames?: string[];
  role?: Role;
}

/** A user bound to a fresh project that has the given providers. */
export async function seedTenant(store: Store, options: TenantOptions = {}): Promise<Tenant> {
  const subject = options.subject ?? 'user-1';
  const user =
    (await store.users.getBySubject(subject)) ??
    (await store.users.create({ id: uuid(), subject, displayName: subject, createdAt: FIXED_TIME }));

  const projectId = options.projectId ?? uuid();
  const project = await store.projects.create({
    id: projectId,
    parentId: options.parentId,
    name: options.projectName ?? `project-${projectId.slice(0, 8)}`,
    metadata: {},
    createdAt: FIXED_TIME,
    updatedAt: FIXED_TIME,
  });

  const providers: Provider[] = [];
  for (const name of options.providerNames ?? ['forge']) {
    providers.push(
      await store.providers.create({
        id: uuid(),
        projectId: project.id,
        name,
        class: ProviderClass.Forge,
        implements: FORGE_OAUTH_IMPLEMENTS,
        version: 'v1',
        config: {},
        createdAt: FIXED_TIME,
        updatedAt: FIXED_TIME,
      }),
    );
  }

  await grantRole(store, user, project, options.role ?? Role.Admin);
  return { user, project, provider: providers[0], providers };
}

export async function grantRole(store: Store, user: User, project: Project, role: Role): Promise<void> {
  await store.roleBindings.create({
    id: uuid(),
    userId: user.id,
    role,
    isAdmin: role === Role.Admin,
    organizationId: project.parentId ?? project.id,
    projectId: project.id,
    createdAt: FIXED_TIME,
  });
}

export const SEVERITY_SCHEMA = {
  type: 'object',
  properties: {
    severity: { type: 'string', enum: ['low', 'medium', 'high'] },
  },
};

export function ruleTypeInput(
  name: string,
  overrides: Partial<RuleTypeInput> = {},
  def: Partial<RuleTypeDefinition> = {},
): RuleTypeInput {
  return {
    name,
    description: `${name} check`,
    guidance: 'Enable the setting in the repository options.',
    def: {
      inEntity: 'repository',
      ruleSchema: SEVERITY_SCHEMA,
      ingest: { type: 'rest' },
      eval: { type: 'jq' },
      ...def,
    },
    ...overrides,
  };
}

/** The RpcError a promise rejects with. */
export async function rejectionOf(promise: Promise<unknown>): Promise<RpcError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RpcError) return err;
    throw err;
  }
  throw new Error('expected the promise to reject');
}

/** The RpcError a function throws. */
export function thrownBy(fn: () => unknown): RpcError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RpcError) return err;
    throw err;
  }
  throw new Error('expected the function to throw');
}
