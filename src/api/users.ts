/**
 * UserService and AdminService methods. These act on the caller rather
 * than on a project.
 */

import { z } from 'zod';
import { notFound } from '../domain/errors';
import { Project } from '../domain/project';
import { Method, defineMethod } from '../rpc/policy';
import { EMPTY, Services, methodName } from './common';

function projectInfo(project: Project) {
  return {
    projectId: project.id,
    name: project.name,
    displayName: project.metadata.displayName ?? project.name,
    description: project.metadata.description ?? '',
  };
}

export function userMethods(services: Services): Method[] {
  return [
    defineMethod({
      fullName: methodName('UserService', 'CreateUser'),
      options: { targetResource: 'user' },
      request: z.object({}),
      handler: async (ctx) => {
        const created = await services.users.createUser(ctx.signal, ctx.requireClaims());
        return {
          id: created.user.id,
          identitySubject: created.user.subject,
          projectId: created.projectId,
          projectName: created.projectName,
          createdAt: created.user.createdAt,
        };
      },
    }),

    defineMethod({
      fullName: methodName('UserService', 'GetUser'),
      options: { targetResource: 'user' },
      request: z.object({}),
      handler: async (ctx) => {
        const { user, projects } = await services.users.getUser(ctx.requireClaims().subject);
        return { user, projects: projects.map(projectInfo) };
      },
    }),

    defineMethod({
      fullName: methodName('UserService', 'DeleteUser'),
      options: { targetResource: 'user' },
      request: z.object({}),
      handler: async (ctx) => {
        await services.users.deleteUser(ctx.signal, ctx.requireClaims().subject);
        return EMPTY;
      },
    }),

    defineMethod({
      fullName: methodName('UserService', 'ResolveInvitation'),
      options: { targetResource: 'user' },
      request: z.object({ code: z.string().min(1), accept: z.boolean() }),
      handler: async (ctx, req) => {
        const resolution = await services.invitations.resolveInvitation(
          ctx.signal,
          ctx.requireClaims(),
          req.code,
          req.accept,
        );
        return { projectId: resolution.projectId, role: resolution.role, isAccepted: resolution.accepted };
      },
    }),

    defineMethod({
      fullName: methodName('UserService', 'ListProjects'),
      options: { targetResource: 'user' },
      request: z.object({}),
      handler: async (ctx) => {
        const projects = await services.projects.listProjects(ctx.requirePermissions().userId);
        return { projects: projects.map(projectInfo) };
      },
    }),

    defineMethod({
      fullName: methodName('AdminService', 'GetUserBySubject'),
      options: { targetResource: 'none', rootAdminOnly: true },
      request: z.object({ subject: z.string().min(1) }),
      handler: async (_ctx, req) => {
        const user = await services.store.users.getBySubject(req.subject);
        if (!user) throw notFound('user not found');
        return { user };
      },
    }),

    defineMethod({
      fullName: methodName('HealthService', 'CheckHealth'),
      options: { anonymous: true, noLog: true },
      request: z.object({}),
      handler: async () => ({ status: 'OK' }),
    }),
  ];
}
