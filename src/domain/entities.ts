/**
 * Entity kinds and their capabilities.
 *
 * Every place that needs to behave differently per entity kind goes
 * through ENTITY_KINDS instead of switching on the kind.
 */

import { Artifact } from './artifact';

export const ENTITY_KIND_VALUES = ['repository', 'artifact', 'build_environment', 'pull_request'] as const;

export type EntityKind = (typeof ENTITY_KIND_VALUES)[number];

/** Field of a profile that holds the rules for each kind. */
export type ProfileRuleField = 'repository' | 'artifact' | 'buildEnvironment' | 'pullRequest';

/** Evaluation row fields the enrichers read. */
export interface EnrichableEvaluation {
  entityId: string;
  repository?: { id: string; owner: string; name: string };
}

export interface EnrichmentSource {
  getArtifact(id: string): Promise<Artifact | null>;
}

export interface EntityKindCapabilities {
  kind: EntityKind;
  profileField: ProfileRuleField;
  /** Wire spelling, e.g. ENTITY_REPOSITORIES. */
  wireName: string;
  /** Accepted spellings when decoding. */
  aliases: readonly string[];
  /** Adds kind-specific fields to an evaluation's entity info. */
  enrich(row: EnrichableEvaluation, info: Record<string, string>, source: EnrichmentSource): Promise<void>;
}

async function enrichWithRepository(row: EnrichableEvaluation, info: Record<string, string>): Promise<void> {
  if (!row.repository) return;
  info.repo_name = row.repository.name;
  info.repo_owner = row.repository.owner;
  info.repository_id = row.repository.id;
}

export const ENTITY_KINDS: Readonly<Record<EntityKind, EntityKindCapabilities>> = {
  repository: {
    kind: 'repository',
    profileField: 'repository',
    wireName: 'ENTITY_REPOSITORIES',
    aliases: ['repository', 'repositories', 'repo'],
    enrich: enrichWithRepository,
  },
  artifact: {
    kind: 'artifact',
    profileField: 'artifact',
    wireName: 'ENTITY_ARTIFACTS',
    aliases: ['artifact', 'artifacts'],
    enrich: async (row, info, source) => {
      await enrichWithRepository(row, info);
      const artifact = await source.getArtifact(row.entityId);
      if (!artifact) return;
      info.artifact_id = artifact.id;
      info.artifact_name = artifact.name;
      info.artifact_type = artifact.type;
    },
  },
  build_environment: {
    kind: 'build_environment',
    profileField: 'buildEnvironment',
    wireName: 'ENTITY_BUILD_ENVIRONMENTS',
    aliases: ['build_environment', 'build_environments', 'build-environment'],
    enrich: enrichWithRepository,
  },
  pull_request: {
    kind: 'pull_request',
    profileField: 'pullRequest',
    wireName: 'ENTITY_PULL_REQUESTS',
    aliases: ['pull_request', 'pull_requests', 'pull-request'],
    enrich: enrichWithRepository,
  },
};

/** Decode any accepted spelling of an entity kind. */
export function parseEntityKind(value: string): EntityKind | null {
  const needle = value.trim();
  for (const kind of ENTITY_KIND_VALUES) {
    const caps = ENTITY_KINDS[kind];
    if (caps.wireName === needle || caps.aliases.includes(needle.toLowerCase())) {
      return kind;
    }
  }
  return null;
}

export function encodeEntityKind(kind: EntityKind): string {
  return ENTITY_KINDS[kind].wireName;
}

export function knownEntityKindsCsv(): string {
  return ENTITY_KIND_VALUES.join(', ');
}
