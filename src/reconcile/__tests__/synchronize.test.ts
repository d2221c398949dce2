/**
 * Tests for the three-pass synchronization against an in-memory API
 *
 * Usage: npx tsx src/reconcile/__tests__/synchronize.test.ts
 */

import { strict as assert } from 'node:assert';
import { AbortedByUserError } from '../../errors.js';
import { seedRoleTemplate } from '../../loader/roleTemplateLoader.js';
import { emptyOrganizationPermissions } from '../../permissions/catalog.js';
import { compileRolePermissions } from '../../permissions/compiler.js';
import type { DesiredState, RoleTemplate, User, WorkspaceAssignment } from '../../types.js';
import { synchronize } from '../synchronize.js';
import { InMemoryAccessApi, RecordingReporter, ScriptedGate } from './inMemoryAccessApi.js';

function standardTemplate(): RoleTemplate {
  const template = seedRoleTemplate('Standard');
  template.primaryWorkspaces.read_patients = true;
  return template;
}

function user(email: string, slugs: string[], active = true): User {
  return {
    email,
    name: email.split('@')[0],
    active,
    assignments: new Map(
      slugs.map((slug, index): [string, WorkspaceAssignment] => [slug, { roleTemplate: 'Standard', sourceFile: 'users/team', row: index + 2 }])
    ),
  };
}

function desiredState(users: User[]): DesiredState {
  return {
    workspaces: new Map([
      ['a', { slug: 'a', name: '[A] Alpha' }],
      ['b', { slug: 'b', name: '[B] Beta' }],
    ]),
    roleTemplates: new Map([['Standard', standardTemplate()]]),
    users: new Map(users.map((u): [string, User] => [u.email, u])),
    warnings: [],
  };
}

function context(answer = true) {
  return { gate: new ScriptedGate(answer), reporter: new RecordingReporter() };
}

async function runTests() {
  let passed = 0;
  let failed = 0;

  async function test(name: string, fn: () => Promise<void> | void) {
    try {
      await fn();
      console.log(`  ✓ ${name}`);
      passed++;
    } catch (err) {
      console.log(`  ✗ ${name}`);
      console.log(`    ${err instanceof Error ? err.message : String(err)}`);
      failed++;
    }
  }

  console.log('synchronize tests\n');

  await test('creates everything on an empty remote, in dependency order', async () => {
    const api = new InMemoryAccessApi();
    const ctx = context();

    const result = await synchronize(api, desiredState([
      user('x@example.com', ['a']),
      user('y@example.com', ['a', 'b']),
    ]), ctx);

    assert.deepStrictEqual(api.writes, [
      { kind: 'workspaces', op: 'create', key: 'a' },
      { kind: 'workspaces', op: 'create', key: 'b' },
      { kind: 'roles', op: 'create', key: '[A] Standard' },
      { kind: 'roles', op: 'create', key: '[A+B] Standard' },
      { kind: 'users', op: 'create', key: 'x@example.com' },
      { kind: 'users', op: 'create', key: 'y@example.com' },
    ]);
    assert.deepStrictEqual(result.workspaces, { total: 2, created: 2, updated: 0, unchanged: 0 });
    assert.deepStrictEqual(result.roles, { total: 2, created: 2, updated: 0, unchanged: 0 });
    assert.deepStrictEqual(result.users, { total: 2, created: 2, updated: 0, unchanged: 0 });
    assert.deepStrictEqual(ctx.gate.questions, [
      'Are you sure you wish to synchronize workspaces?',
      'Are you sure you wish to synchronize roles?',
      'Are you sure you wish to synchronize users?',
    ]);
    assert.deepStrictEqual(
      ctx.reporter.events.filter(e => e.startsWith('phase ')),
      ['phase Synchronizing Workspaces...', 'phase Synchronizing Roles...', 'phase Synchronizing Users...']
    );

    const users = await api.users.query();
    const roles = await api.roles.query();
    const roleIdOf = (name: string) => roles.find(r => r.name === name)?.id;
    assert.deepStrictEqual(users.map(u => [u.email, u.roleId, u.active]), [
      ['x@example.com', roleIdOf('[A] Standard'), true],
      ['y@example.com', roleIdOf('[A+B] Standard'), true],
    ]);
  });

  await test('a second run changes nothing and asks nothing', async () => {
    const api = new InMemoryAccessApi();
    const desired = desiredState([user('x@example.com', ['a']), user('y@example.com', ['b'], false)]);
    await synchronize(api, desired, context());
    const writesAfterFirstRun = api.writes.length;

    const ctx = context(false);
    const result = await synchronize(api, desired, ctx);

    assert.strictEqual(api.writes.length, writesAfterFirstRun);
    assert.deepStrictEqual(ctx.gate.questions, []);
    assert.deepStrictEqual(result.workspaces, { total: 2, created: 0, updated: 0, unchanged: 2 });
    assert.deepStrictEqual(result.roles, { total: 2, created: 0, updated: 0, unchanged: 2 });
    assert.deepStrictEqual(result.users, { total: 2, created: 0, updated: 0, unchanged: 2 });
    assert.deepStrictEqual(ctx.reporter.events, [
      'phase Synchronizing Workspaces...',
      'up-to-date workspaces 2',
      'phase Synchronizing Roles...',
      'up-to-date roles 2',
      'phase Synchronizing Users...',
      'up-to-date users 2',
    ]);
  });

  await test('renames a workspace in place', async () => {
    const api = new InMemoryAccessApi();
    api.seedWorkspace({ id: 'w-a', slug: 'a', name: '[A] Old Alpha' });

    const result = await synchronize(api, desiredState([]), context());

    assert.deepStrictEqual(result.workspaces, { total: 2, created: 1, updated: 1, unchanged: 0 });
    const workspaces = await api.workspaces.query();
    assert.deepStrictEqual(workspaces.find(w => w.slug === 'a'), {
      id: 'w-a',
      slug: 'a',
      name: '[A] Alpha',
      protected: false,
    });
  });

  await test('ignores the private and user fields when comparing roles', async () => {
    const api = new InMemoryAccessApi();
    api.seedWorkspace({ id: 'w-a', slug: 'a', name: '[A] Alpha' });
    api.seedWorkspace({ id: 'w-b', slug: 'b', name: '[B] Beta' });
    const permissions = compileRolePermissions({
      roleName: '[A] Standard',
      template: standardTemplate(),
      primary: ['a'],
      allSlugs: ['a', 'b'],
      workspaceIds: new Map([['a', 'w-a'], ['b', 'w-b']]),
    });
    api.seedRole({ name: '[A] Standard', permissions: { ...permissions, private: true, user: 'someone' } });

    const result = await synchronize(api, desiredState([user('x@example.com', ['a'])]), context());

    assert.deepStrictEqual(result.roles, { total: 1, created: 0, updated: 0, unchanged: 1 });
    assert.deepStrictEqual(api.writes, [{ kind: 'users', op: 'create', key: 'x@example.com' }]);
  });

  await test('rewrites a drifted role and clears its bookkeeping fields', async () => {
    const api = new InMemoryAccessApi();
    api.seedWorkspace({ id: 'w-a', slug: 'a', name: '[A] Alpha' });
    api.seedWorkspace({ id: 'w-b', slug: 'b', name: '[B] Beta' });
    const seeded = api.seedRole({
      name: '[A] Standard',
      permissions: { ...emptyOrganizationPermissions(), workspaces: [], private: true, user: 'someone' },
    });

    const result = await synchronize(api, desiredState([user('x@example.com', ['a'])]), context());

    assert.deepStrictEqual(result.roles, { total: 1, created: 0, updated: 1, unchanged: 0 });
    const stored = api.storedRole(seeded.id);
    assert.ok(stored);
    assert.strictEqual(stored.permissions.private, false);
    assert.strictEqual(stored.permissions.user, null);
    assert.deepStrictEqual(stored.permissions.workspaces.map(w => [w.id, w.read_patients]), [['w-a', true]]);
  });

  await test('moves a user to the synchronized role by id', async () => {
    const api = new InMemoryAccessApi();
    api.seedUser({ email: 'x@example.com', name: 'x', active: true, roleId: 'r-stale' });

    const result = await synchronize(api, desiredState([user('x@example.com', ['a'])]), context());

    assert.deepStrictEqual(result.users, { total: 1, created: 0, updated: 1, unchanged: 0 });
    const [stored] = await api.users.query();
    const [role] = await api.roles.query();
    assert.strictEqual(stored.roleId, role.id);
    assert.strictEqual(stored.name, 'x');
  });

  await test('assigns a role to a user the remote reports without one', async () => {
    const api = new InMemoryAccessApi();
    api.seedUser({ email: 'x@example.com', name: 'x', active: true, roleId: null });
    api.seedUser({ email: 'ghost@example.com', name: 'Ghost', active: true, roleId: null });

    const result = await synchronize(api, desiredState([user('x@example.com', ['a'])]), context());

    assert.deepStrictEqual(result.users, { total: 1, created: 0, updated: 1, unchanged: 0 });
    assert.deepStrictEqual(result.unknown.users.map(u => u.email), ['ghost@example.com']);
    const [role] = await api.roles.query();
    const stored = (await api.users.query()).find(u => u.email === 'x@example.com');
    assert.strictEqual(stored?.roleId, role.id);
  });

  await test('reports unknown records without touching them, except the Admin role', async () => {
    const api = new InMemoryAccessApi();
    api.seedWorkspace({ slug: 'legacy', name: '[LEGACY] Archive' });
    api.seedRole({ name: 'Admin', permissions: { ...emptyOrganizationPermissions(), workspaces: [] } });
    api.seedRole({ name: 'Old Role', permissions: { ...emptyOrganizationPermissions(), workspaces: [] } });
    api.seedUser({ email: 'ghost@example.com', name: 'Ghost', active: true, roleId: 'r-old' });
    const ctx = context();

    const result = await synchronize(api, desiredState([user('x@example.com', ['a'])]), ctx);

    assert.deepStrictEqual(result.unknown.workspaces.map(w => w.slug), ['legacy']);
    assert.deepStrictEqual(result.unknown.roles.map(r => r.name), ['Old Role']);
    assert.deepStrictEqual(result.unknown.users.map(u => u.email), ['ghost@example.com']);
    assert.deepStrictEqual(
      api.writes.filter(w => ['legacy', 'Admin', 'Old Role', 'ghost@example.com'].includes(w.key)),
      []
    );
    assert.deepStrictEqual(ctx.reporter.events.slice(-4), [
      'phase Identifying Unknown Resources...',
      'unknown workspaces legacy',
      'unknown roles Old Role',
      'unknown users ghost@example.com',
    ]);
  });

  await test('declining the first prompt leaves the remote untouched', async () => {
    const api = new InMemoryAccessApi();

    await assert.rejects(
      synchronize(api, desiredState([user('x@example.com', ['a'])]), context(false)),
      (err: unknown) => {
        assert.ok(err instanceof AbortedByUserError);
        assert.strictEqual(err.phase, 'workspaces');
        return true;
      }
    );
    assert.deepStrictEqual(api.writes, []);
  });

  console.log(`\n${passed} passed, ${failed} failed`);
  process.exit(failed > 0 ? 1 : 0);
}

runTests();
