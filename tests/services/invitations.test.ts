import { resolvePermissions } from '../../src/auth/permissions';
import { Role } from '../../src/domain/rbac';
import { createLogger, resetLogHandler, setLogHandler } from '../../src/logger';
import { InvitationService } from '../../src/services/invitations';
import { ProjectService } from '../../src/services/projects';
import { MemoryStore, createMemoryStore } from '../../src/storage/memory-store';
import { Tenant, claimsFor, rejectionOf, seedTenant } from '../helpers/fixtures';

describe('InvitationService', () => {
  let store: MemoryStore;
  let invitations: InvitationService;
  let owner: Tenant;

  beforeEach(async () => {
    setLogHandler(() => undefined);
    store = createMemoryStore();
    invitations = new InvitationService(store, createLogger());
    owner = await seedTenant(store, { subject: 'owner' });
  });

  afterEach(() => {
    resetLogHandler();
  });

  describe('createInvitation', () => {
    it('issues a random code for the project', async () => {
      const invitation = await invitations.createInvitation(
        undefined,
        owner.project.id,
        owner.user.id,
        'bob@example.com',
        Role.Viewer,
      );
      expect(invitation.code).toMatch(/^[0-9a-f]{32}$/);
      expect(invitation).toMatchObject({
        email: 'bob@example.com',
        projectId: owner.project.id,
        role: Role.Viewer,
        sponsor: owner.user.id,
      });
      expect(await invitations.listInvitations(owner.project.id)).toEqual([invitation]);
    });

    it('refuses a second invitation for the same address', async () => {
      await invitations.createInvitation(undefined, owner.project.id, owner.user.id, 'bob@example.com', Role.Viewer);
      const err = await rejectionOf(
        invitations.createInvitation(undefined, owner.project.id, owner.user.id, 'Bob@Example.com', Role.Editor),
      );
      expect(err.code).toBe('AlreadyExists');
      expect(err.message).toBe('an invitation for Bob@Example.com on this project already exists');
    });
  });

  describe('resolveInvitation', () => {
    it('grants the role to the accepting caller, creating their user', async () => {
      const { code } = await invitations.createInvitation(
        undefined,
        owner.project.id,
        owner.user.id,
        'bob@example.com',
        Role.Editor,
      );

      const result = await invitations.resolveInvitation(undefined, claimsFor('bob'), code, true);
      expect(result).toEqual({ projectId: owner.project.id, role: Role.Editor, accepted: true });

      const permissions = await resolvePermissions(store, claimsFor('bob'));
      expect(permissions.projectIds).toEqual([owner.project.id]);
      expect(permissions.roles).toEqual([
        { roleId: Role.Editor, isAdmin: false, organizationId: owner.project.id, projectId: owner.project.id },
      ]);
      expect(await store.invitations.getByCode(code)).toBeNull();
    });

    it('leaves the granted binding unchanged when the same code is accepted twice', async () => {
      const { code } = await invitations.createInvitation(
        undefined,
        owner.project.id,
        owner.user.id,
        'bob@example.com',
        Role.Editor,
      );
      await invitations.resolveInvitation(undefined, claimsFor('bob'), code, true);
      const granted = await store.roleBindings.listByProject(owner.project.id);

      const err = await rejectionOf(invitations.resolveInvitation(undefined, claimsFor('bob'), code, true));
      expect(err.code).toBe('NotFound');
      expect(await store.roleBindings.listByProject(owner.project.id)).toEqual(granted);
      expect(granted.filter((b) => b.role === Role.Editor)).toHaveLength(1);
      expect(await invitations.listInvitations(owner.project.id)).toEqual([]);
    });

    it('consumes a declined invitation without granting anything', async () => {
      const { code } = await invitations.createInvitation(
        undefined,
        owner.project.id,
        owner.user.id,
        'bob@example.com',
        Role.Editor,
      );

      const result = await invitations.resolveInvitation(undefined, claimsFor('bob'), code, false);
      expect(result.accepted).toBe(false);
      expect(await store.users.getBySubject('bob')).toBeNull();
      expect(await store.invitations.getByCode(code)).toBeNull();
    });

    it('replaces the role the caller held before', async () => {
      const bob = await seedTenant(store, { subject: 'bob' });
      const { code } = await invitations.createInvitation(
        undefined,
        bob.project.id,
        bob.user.id,
        'owner@example.com',
        Role.Admin,
      );
      const ownerViewer = await invitations.createInvitation(
        undefined,
        bob.project.id,
        bob.user.id,
        'owner+viewer@example.com',
        Role.Viewer,
      );
      await invitations.resolveInvitation(undefined, claimsFor('owner'), ownerViewer.code, true);
      await invitations.resolveInvitation(undefined, claimsFor('owner'), code, true);

      const bindings = await store.roleBindings.listByProject(bob.project.id);
      expect(bindings.filter((b) => b.userId === owner.user.id).map((b) => b.role)).toEqual([Role.Admin]);
    });

    it('consumes the invitation and reports a role already held', async () => {
      const { code } = await invitations.createInvitation(
        undefined,
        owner.project.id,
        owner.user.id,
        'owner@example.com',
        Role.Admin,
      );

      const err = await rejectionOf(invitations.resolveInvitation(undefined, claimsFor('owner'), code, true));
      expect(err.code).toBe('AlreadyExists');
      expect(err.message).toBe('user already has the admin role on this project');
      expect(await store.invitations.getByCode(code)).toBeNull();
      expect(await store.roleBindings.listByProject(owner.project.id)).toHaveLength(1);
    });

    it('binds sub-project roles to the root of the tree', async () => {
      const child = await new ProjectService(store).createProject(undefined, owner.project.id, 'team', owner.user.id);
      const { code } = await invitations.createInvitation(
        undefined,
        child.id,
        owner.user.id,
        'bob@example.com',
        Role.Viewer,
      );
      await invitations.resolveInvitation(undefined, claimsFor('bob'), code, true);

      const permissions = await resolvePermissions(store, claimsFor('bob'));
      expect(permissions.roles).toEqual([
        { roleId: Role.Viewer, isAdmin: false, organizationId: owner.project.id, projectId: child.id },
      ]);
    });

    it('reports an unknown code', async () => {
      const err = await rejectionOf(invitations.resolveInvitation(undefined, claimsFor('bob'), 'missing', true));
      expect(err.code).toBe('NotFound');
      expect(err.message).toBe('invitation not found');
    });
  });
});
