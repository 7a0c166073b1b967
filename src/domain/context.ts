/**
 * Request and entity contexts.
 *
 * Requests name the project (and optionally the provider) they act on
 * through a v1 context, or through the newer v2 context that only carries a
 * project id. The pipeline turns either into an EntityContext.
 */

/** Legacy request context. `project` must be a UUID when present. */
export interface ContextV1 {
  project?: string;
  provider?: string;
}

/** Request context carrying only a project id. */
export interface ContextV2 {
  projectId: string;
}

/**
 * What a project-scoped request exposes to the pipeline. `v1` is `null`
 * when the request carried no context at all.
 */
export interface RequestContexts {
  v1?: ContextV1 | null;
  v2?: ContextV2;
}

/** The `{project, provider}` pair resolved for a call. */
export interface EntityContext {
  project: { id: string };
  provider: { name: string };
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/** Canonical (lower-case) form of a well-formed UUID, or null. */
export function parseUuid(value: string): string | null {
  return isUuid(value) ? value.toLowerCase() : null;
}
