import { resolveProvider } from '../../src/providers/resolver';
import { createMemoryStore } from '../../src/storage/memory-store';
import { rejectionOf, seedTenant } from '../helpers/fixtures';

describe('resolveProvider', () => {
  it('infers the only provider of a project', async () => {
    const store = createMemoryStore();
    const { project, provider } = await seedTenant(store);
    expect(await resolveProvider(store.providers, project.id, undefined)).toEqual(provider);
    expect(await resolveProvider(store.providers, project.id, '')).toEqual(provider);
  });

  it('refuses to infer between several providers', async () => {
    const store = createMemoryStore();
    const { project } = await seedTenant(store, { providerNames: ['forge', 'forge-enterprise'] });
    const err = await rejectionOf(resolveProvider(store.providers, project.id, undefined));
    expect(err.code).toBe('InvalidArgument');
    expect(err.message).toBe('cannot infer provider, there are 2 providers available');
  });

  it('refuses to infer when the project has no provider', async () => {
    const store = createMemoryStore();
    const { project } = await seedTenant(store, { providerNames: [] });
    const err = await rejectionOf(resolveProvider(store.providers, project.id, undefined));
    expect(err.message).toBe('cannot infer provider, there are 0 providers available');
  });

  it('picks a provider by name', async () => {
    const store = createMemoryStore();
    const { project, providers } = await seedTenant(store, { providerNames: ['forge', 'forge-enterprise'] });
    expect(await resolveProvider(store.providers, project.id, 'forge-enterprise')).toEqual(providers[1]);
  });

  it('rejects a name no provider of the project carries', async () => {
    const store = createMemoryStore();
    const { project } = await seedTenant(store);
    const other = await seedTenant(store, { subject: 'bob', providerNames: ['registry'] });

    const err = await rejectionOf(resolveProvider(store.providers, project.id, 'registry'));
    expect(err.code).toBe('InvalidArgument');
    expect(err.message).toBe('invalid provider name');
    expect((await resolveProvider(store.providers, other.project.id, 'registry')).name).toBe('registry');
  });
});
