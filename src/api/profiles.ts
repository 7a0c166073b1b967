/**
 * ProfileService methods.
 */

import { z } from 'zod';
import { ACTION_MODES, Profile } from '../domain/profile';
import { Method, defineMethod } from '../rpc/policy';
import { RuleRefSchema } from '../services/profiles';
import { EMPTY, Services, contextsOf, methodName, projectScoped, providerFor } from './common';

const SERVICE = 'ProfileService';

const ProfileSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  displayName: z.string().optional(),
  labels: z.array(z.string()).optional(),
  remediate: z.enum(ACTION_MODES).optional(),
  alert: z.enum(ACTION_MODES).optional(),
  context: z.object({ project: z.string().optional(), provider: z.string().optional() }).optional(),
  repository: z.array(RuleRefSchema).optional(),
  artifact: z.array(RuleRefSchema).optional(),
  buildEnvironment: z.array(RuleRefSchema).optional(),
  pullRequest: z.array(RuleRefSchema).optional(),
});

type ProfileMessage = z.infer<typeof ProfileSchema>;

const WriteProfileRequest = z.object({ ...projectScoped, profile: ProfileSchema });

/** The profile's own context only matters for detecting moves on update. */
function toSpec(message: ProfileMessage) {
  const { context, ...rest } = message;
  return { ...rest, projectId: context?.project, providerName: context?.provider };
}

function toWire(profile: Profile) {
  const { projectId, providerName, ...rest } = profile;
  return { ...rest, context: { project: projectId, provider: providerName } };
}

export function profileMethods(services: Services): Method[] {
  return [
    defineMethod({
      fullName: methodName(SERVICE, 'CreateProfile'),
      options: { targetResource: 'project' },
      request: WriteProfileRequest,
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const provider = await providerFor(services, ctx);
        const profile = await services.profiles.createProfile(
          ctx.signal,
          ctx.requireEntity().project.id,
          provider.name,
          toSpec(req.profile),
        );
        return { profile: toWire(profile) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'UpdateProfile'),
      options: { targetResource: 'project' },
      request: WriteProfileRequest,
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const provider = await providerFor(services, ctx);
        const profile = await services.profiles.updateProfile(
          ctx.signal,
          ctx.requireEntity().project.id,
          provider.name,
          toSpec(req.profile),
        );
        return { profile: toWire(profile) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'DeleteProfile'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped, id: z.string().uuid() }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        await services.profiles.deleteProfile(ctx.signal, ctx.requireEntity().project.id, req.id);
        return EMPTY;
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'ListProfiles'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async (ctx) => {
        const profiles = await services.profiles.listProfiles(ctx.requireEntity().project.id);
        return { profiles: profiles.map(toWire) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'GetProfileById'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped, id: z.string().uuid() }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const profile = await services.profiles.getProfileById(ctx.requireEntity().project.id, req.id);
        return { profile: toWire(profile) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'GetProfileByName'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped, name: z.string().min(1) }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const profile = await services.profiles.getProfileByName(ctx.requireEntity().project.id, req.name);
        return { profile: toWire(profile) };
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'GetProfileStatusByName'),
      options: { targetResource: 'project' },
      request: z.object({
        ...projectScoped,
        name: z.string().min(1),
        all: z.boolean().optional(),
        entity: z.object({ id: z.string(), type: z.string() }).optional(),
        rule: z.string().optional(),
      }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const provider = await providerFor(services, ctx);
        return services.profiles.getProfileStatusByName(ctx.requireEntity().project.id, provider.name, req.name, {
          all: req.all,
          entity: req.entity,
          rule: req.rule,
        });
      },
    }),

    defineMethod({
      fullName: methodName(SERVICE, 'GetProfileStatusByProject'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async (ctx) => {
        const profileStatus = await services.profiles.getProfileStatusByProject(ctx.requireEntity().project.id);
        return { profileStatus };
      },
    }),
  ];
}
