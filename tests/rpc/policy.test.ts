import { z } from 'zod';
import { DEFAULT_RPC_OPTIONS, PolicyIndex, defineMethod } from '../../src/rpc/policy';
import { thrownBy } from '../helpers/fixtures';

const NameRequest = z.object({ name: z.string() });

function method(fullName: string, withPolicy = true) {
  return defineMethod({
    fullName,
    options: withPolicy ? { targetResource: 'project', ownerOnly: true } : undefined,
    request: NameRequest,
    handler: async (_ctx, request) => ({ echoed: request.name }),
  });
}

describe('PolicyIndex', () => {
  it('fills unset options with the defaults', () => {
    const index = PolicyIndex.build([method('test.v1.Svc/Create')]);
    expect(index.lookup('test.v1.Svc/Create')).toEqual({
      anonymous: false,
      noLog: false,
      targetResource: 'project',
      ownerOnly: true,
      rootAdminOnly: false,
    });
  });

  it('returns the defaults for unknown methods', () => {
    const index = PolicyIndex.build([method('test.v1.Svc/Create')]);
    expect(index.lookup('test.v1.Svc/Missing')).toBe(DEFAULT_RPC_OPTIONS);
    expect(index.has('test.v1.Svc/Missing')).toBe(false);
  });

  it('leaves methods without a policy out of the index', () => {
    const index = PolicyIndex.build([method('test.v1.Svc/Bare', false)]);
    expect(index.has('test.v1.Svc/Bare')).toBe(false);
  });

  it('refuses duplicate method names', () => {
    expect(() => PolicyIndex.build([method('test.v1.Svc/Create'), method('test.v1.Svc/Create')])).toThrow(
      'duplicate RPC method test.v1.Svc/Create',
    );
  });

  it('freezes the defaults', () => {
    expect(Object.isFrozen(DEFAULT_RPC_OPTIONS)).toBe(true);
  });
});

describe('defineMethod', () => {
  it('leaves contexts unset when the request names no project', () => {
    const call = method('test.v1.Svc/Create').prepare({ name: 'demo' });
    expect(call.contexts).toBeUndefined();
  });

  it('rejects bodies that do not match the request type', () => {
    const err = thrownBy(() => method('test.v1.Svc/Create').prepare({ name: 7 }));
    expect(err.code).toBe('InvalidArgument');
    expect(err.message).toBe('invalid request: name: Expected string, received number');
  });

  it('decodes a missing body as an empty object', () => {
    const optional = defineMethod({
      fullName: 'test.v1.Svc/List',
      request: z.object({ limit: z.number().optional() }),
      handler: async (_ctx, request) => request,
    });
    expect(() => optional.prepare(undefined)).not.toThrow();
  });
});
