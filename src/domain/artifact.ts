/**
 * Artifact domain model.
 *
 * Artifacts are registered by the forge integrations; this service only
 * reads them to enrich evaluation status.
 */

export interface Artifact {
  id: string;
  projectId: string;
  providerName: string;
  repositoryId?: string;
  name: string;
  /** e.g. "container". */
  type: string;
  visibility: string;
  createdAt: string;
}
