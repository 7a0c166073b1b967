/**
 * Express server configuration.
 *
 * Assembles the store, event bus, services and the RPC dispatcher with its
 * interceptor chain, and mounts them behind the HTTP binding.
 */

import express from 'express';
import { errorHandler } from './api/middleware';
import { createRpcRoutes } from './api/http';
import { Services } from './api/common';
import { profileMethods } from './api/profiles';
import { projectMethods } from './api/projects';
import { ruleTypeMethods } from './api/rule-types';
import { userMethods } from './api/users';
import { ClaimsValidator, SigningKey, TokenValidator } from './auth/token-validator';
import { InMemoryEventBus } from './data-plane/publisher';
import { Logger, logger as rootLogger } from './logger';
import { RpcDispatcher } from './rpc/dispatcher';
import {
  authenticationInterceptor,
  authorizationInterceptor,
  entityContextInterceptor,
  loggingInterceptor,
} from './rpc/interceptors';
import { InvitationService } from './services/invitations';
import { ProfileService } from './services/profiles';
import { ProjectService } from './services/projects';
import { RuleTypeService } from './services/rule-types';
import { UserService } from './services/users';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';

const startTime = Date.now();

export const DEFAULT_EVENTS_BUFFER_SIZE = 1024;
export const DEFAULT_PROVIDER_NAME = 'forge';

export interface AppContextOptions {
  store?: Store;
  /** Used when no validator is given. */
  signingKeys?: SigningKey[];
  validator?: ClaimsValidator;
  issuer?: string;
  audience?: string;
  eventsBufferSize?: number;
  defaultProviderName?: string;
  logger?: Logger;
}

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  events: InMemoryEventBus;
  validator: ClaimsValidator;
  services: Services;
  dispatcher: RpcDispatcher;
  logger: Logger;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const log = options.logger ?? rootLogger;
  const store = options.store ?? createMemoryStore();
  const events = new InMemoryEventBus(options.eventsBufferSize ?? DEFAULT_EVENTS_BUFFER_SIZE, log);
  const validator =
    options.validator ??
    new TokenValidator(options.signingKeys ?? [], { issuer: options.issuer, audience: options.audience });

  const services: Services = {
    store,
    ruleTypes: new RuleTypeService(store),
    profiles: new ProfileService(store, events, log),
    projects: new ProjectService(store),
    users: new UserService(store, options.defaultProviderName ?? DEFAULT_PROVIDER_NAME, log),
    invitations: new InvitationService(store, log),
  };

  const dispatcher = new RpcDispatcher(
    [...userMethods(services), ...projectMethods(services), ...ruleTypeMethods(services), ...profileMethods(services)],
    [
      loggingInterceptor(),
      authenticationInterceptor({ validator, store }),
      entityContextInterceptor(),
      authorizationInterceptor(),
    ],
  );

  return { store, events, validator, services, dispatcher, logger: log };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      methods: ctx.dispatcher.methodNames().length,
    });
  });

  app.use('/', createRpcRoutes(ctx.dispatcher, ctx.logger.child({ component: 'rpc' })));
  app.use(errorHandler);

  return app;
}
