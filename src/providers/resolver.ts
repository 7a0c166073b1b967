/**
 * Picks the provider a project-scoped call acts through.
 */

import { invalidArgument } from '../domain/errors';
import { Provider } from '../domain/provider';
import { ProviderStore } from '../storage/store';

/**
 * An explicit name must match exactly one provider of the project. Without
 * a name the project must have exactly one provider.
 */
export async function resolveProvider(
  providers: ProviderStore,
  projectId: string,
  name: string | undefined,
): Promise<Provider> {
  if (name !== undefined && name !== '') {
    const matches = await providers.find(projectId, { name });
    if (matches.length !== 1) throw invalidArgument('invalid provider name');
    return matches[0];
  }

  const all = await providers.listByProject(projectId);
  if (all.length !== 1) {
    throw invalidArgument(`cannot infer provider, there are ${all.length} providers available`);
  }
  return all[0];
}
