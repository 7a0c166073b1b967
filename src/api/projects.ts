/**
 * ProjectsService, ProvidersService and PermissionsService methods.
 */

import { z } from 'zod';
import { Invitation } from '../domain/invitation';
import { Provider } from '../domain/provider';
import { Role } from '../domain/rbac';
import { Method, defineMethod } from '../rpc/policy';
import { RoleAssignment } from '../services/projects';
import { Services, contextsOf, methodName, projectScoped } from './common';

function providerInfo(provider: Provider) {
  return {
    id: provider.id,
    name: provider.name,
    class: provider.class,
    implements: provider.implements,
    version: provider.version,
    project: provider.projectId,
  };
}

function invitationInfo(invitation: Invitation) {
  return {
    code: invitation.code,
    email: invitation.email,
    project: invitation.projectId,
    role: invitation.role,
    sponsor: invitation.sponsor,
    createdAt: invitation.createdAt,
  };
}

const RoleAssignmentSchema = z.object({ role: z.nativeEnum(Role), subject: z.string().min(1) });

function roleAssignmentInfo(assignment: RoleAssignment) {
  return { role: assignment.role, subject: assignment.subject, project: assignment.projectId };
}

export function projectMethods(services: Services): Method[] {
  return [
    defineMethod({
      fullName: methodName('ProjectsService', 'CreateProject'),
      options: { targetResource: 'project', ownerOnly: true },
      request: z.object({ ...projectScoped, name: z.string() }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const project = await services.projects.createProject(
          ctx.signal,
          ctx.requireEntity().project.id,
          req.name,
          ctx.requirePermissions().userId,
        );
        return { project: { projectId: project.id, name: project.name, parentId: project.parentId } };
      },
    }),

    defineMethod({
      fullName: methodName('ProjectsService', 'DeleteProject'),
      options: { targetResource: 'project', ownerOnly: true },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async (ctx) => {
        const projectId = ctx.requireEntity().project.id;
        await services.projects.deleteProject(ctx.signal, projectId);
        return { projectId };
      },
    }),

    defineMethod({
      fullName: methodName('ProvidersService', 'ListProviders'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async (ctx) => {
        const providers = await services.projects.listProviders(ctx.requireEntity().project.id);
        return { providers: providers.map(providerInfo) };
      },
    }),

    defineMethod({
      fullName: methodName('ProvidersService', 'GetProvider'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped, name: z.string().min(1) }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const provider = await services.projects.getProvider(ctx.requireEntity().project.id, req.name);
        return { provider: providerInfo(provider) };
      },
    }),

    defineMethod({
      fullName: methodName('PermissionsService', 'ListRoles'),
      options: { targetResource: 'project' },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async () => ({ roles: services.projects.listRoles() }),
    }),

    defineMethod({
      fullName: methodName('PermissionsService', 'CreateInvitation'),
      options: { targetResource: 'project', ownerOnly: true },
      request: z.object({ ...projectScoped, email: z.string().email(), role: z.nativeEnum(Role) }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const invitation = await services.invitations.createInvitation(
          ctx.signal,
          ctx.requireEntity().project.id,
          ctx.requirePermissions().userId ?? ctx.requireClaims().subject,
          req.email,
          req.role,
        );
        return { invitation: invitationInfo(invitation) };
      },
    }),

    defineMethod({
      fullName: methodName('PermissionsService', 'ListInvitations'),
      options: { targetResource: 'project', ownerOnly: true },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async (ctx) => {
        const invitations = await services.invitations.listInvitations(ctx.requireEntity().project.id);
        return { invitations: invitations.map(invitationInfo) };
      },
    }),

    defineMethod({
      fullName: methodName('PermissionsService', 'ListRoleAssignments'),
      options: { targetResource: 'project', ownerOnly: true },
      request: z.object({ ...projectScoped }),
      contextOf: contextsOf,
      handler: async (ctx) => {
        const assignments = await services.projects.listRoleAssignments(ctx.requireEntity().project.id);
        return { roleAssignments: assignments.map(roleAssignmentInfo) };
      },
    }),

    defineMethod({
      fullName: methodName('PermissionsService', 'AssignRole'),
      options: { targetResource: 'project', ownerOnly: true },
      request: z.object({ ...projectScoped, roleAssignment: RoleAssignmentSchema }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const assignment = await services.projects.assignRole(
          ctx.signal,
          ctx.requireEntity().project.id,
          req.roleAssignment.subject,
          req.roleAssignment.role,
        );
        return { roleAssignment: roleAssignmentInfo(assignment) };
      },
    }),

    defineMethod({
      fullName: methodName('PermissionsService', 'RemoveRole'),
      options: { targetResource: 'project', ownerOnly: true },
      request: z.object({ ...projectScoped, roleAssignment: RoleAssignmentSchema }),
      contextOf: contextsOf,
      handler: async (ctx, req) => {
        const assignment = await services.projects.removeRole(
          ctx.signal,
          ctx.requireEntity().project.id,
          req.roleAssignment.subject,
          req.roleAssignment.role,
        );
        return { roleAssignment: roleAssignmentInfo(assignment) };
      },
    }),
  ];
}
