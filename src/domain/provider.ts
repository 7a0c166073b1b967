/**
 * Provider domain model.
 *
 * A provider is a named integration under a project, typically a forge
 * connection, that scopes rule types and profiles.
 */

export enum ProviderClass {
  Forge = 'forge',
  ForgeApp = 'forge-app',
  ContainerRegistry = 'container-registry',
}

export enum ProviderCapability {
  RepoLister = 'repo-lister',
  Git = 'git',
  Rest = 'rest',
  ImageLister = 'image-lister',
}

export interface Provider {
  id: string;
  projectId: string;
  name: string;
  class: ProviderClass;
  implements: ProviderCapability[];
  version: string;
  /** Opaque provider configuration. */
  config: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

/** Capabilities a forge connection made through the OAuth flow implements. */
export const FORGE_OAUTH_IMPLEMENTS: ProviderCapability[] = [
  ProviderCapability.RepoLister,
  ProviderCapability.Git,
  ProviderCapability.Rest,
];
