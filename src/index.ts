/**
 * Rampart: multi-tenant supply-chain policy control plane.
 *
 * Public exports for embedding the server or its pieces; `main.ts` is the
 * stand-alone entry point.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export { loadConfig, ConfigError } from './config';
export type { ServerConfig } from './config';
export { TokenValidator } from './auth/token-validator';
export type { Claims, ClaimsValidator, SigningKey } from './auth/token-validator';
export { resolvePermissions } from './auth/permissions';
export { RpcDispatcher } from './rpc/dispatcher';
export { PolicyIndex, defineMethod } from './rpc/policy';
export type { RpcOptions, TargetResource } from './rpc/policy';
export { resolveProvider } from './providers/resolver';
export { InMemoryEventBus } from './data-plane/publisher';
export { createMemoryStore, MemoryStore } from './storage/memory-store';
export type { Store, Querier } from './storage/store';
export * from './domain';
