/**
 * Tests for userLoader
 *
 * Usage: npx tsx src/loader/__tests__/userLoader.test.ts
 */

import { strict as assert } from 'node:assert';
import { DEFAULT_COLUMNS } from '../../config.js';
import { SheetNotFoundError, UserRowError, type UserRowErrorKind } from '../../errors.js';
import { MemoryWorkbook, type Cell } from '../../tabular/csvWorkbook.js';
import type { RoleTemplate, Workspace } from '../../types.js';
import { seedRoleTemplate } from '../roleTemplateLoader.js';
import { loadUsers } from '../userLoader.js';

const HEADER: Cell[] = ['Workspace', 'Name', 'Email', 'Role', 'Active'];

const workspaces = new Map<string, Workspace>([
  ['w1', { slug: 'w1', name: '[W1] One' }],
  ['w2', { slug: 'w2', name: '[W2] Two' }],
]);

const roleTemplates = new Map<string, RoleTemplate>([
  ['R1', seedRoleTemplate('R1')],
  ['R2', seedRoleTemplate('R2')],
]);

function usersFile(source: string, rows: Cell[][]): MemoryWorkbook {
  return new MemoryWorkbook(source, { Users: [HEADER, ...rows] });
}

function load(...workbooks: MemoryWorkbook[]) {
  return loadUsers({ workbooks, columns: DEFAULT_COLUMNS.users, workspaces, roleTemplates });
}

function expectRowError(fn: () => unknown, kind: UserRowErrorKind, detail: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof UserRowError);
    assert.strictEqual(err.kind, kind);
    assert.strictEqual(err.detail, detail);
    return true;
  });
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

  console.log('userLoader tests\n');

  await test('normalizes fields and merges users across files by email', () => {
    const { users, warnings } = load(
      usersFile('users/a', [[' W1 ', ' Ann Lee ', 'Ann@Example.com', 'R1', 'Yes']]),
      usersFile('users/b', [['w2', 'Ann Lee', 'ann@example.com', 'R1', 'yes']])
    );

    assert.deepStrictEqual(Array.from(users.keys()), ['ann@example.com']);
    const ann = users.get('ann@example.com');
    assert.ok(ann);
    assert.strictEqual(ann.name, 'Ann Lee');
    assert.strictEqual(ann.active, true);
    assert.deepStrictEqual(Array.from(ann.assignments.entries()), [
      ['w1', { roleTemplate: 'R1', sourceFile: 'users/a', row: 2 }],
      ['w2', { roleTemplate: 'R1', sourceFile: 'users/b', row: 2 }],
    ]);
    assert.deepStrictEqual(warnings, []);
  });

  await test('coerces the active flag leniently', () => {
    const { users } = load(usersFile('users/a', [
      ['w1', 'A', 'a@example.com', 'R1', 'TRUE'],
      ['w1', 'B', 'b@example.com', 'R1', 'no'],
      ['w1', 'C', 'c@example.com', 'R1', 'maybe'],
    ]));
    assert.deepStrictEqual(
      Array.from(users.values()).map(u => u.active),
      [true, false, false]
    );
  });

  await test('skips entirely empty rows', () => {
    const { users } = load(usersFile('users/a', [
      [null, null, null, null, null],
      ['w1', 'A', 'a@example.com', 'R1', 'yes'],
      [],
    ]));
    assert.strictEqual(users.size, 1);
  });

  await test('names the first missing field of a partial row', () => {
    expectRowError(
      () => load(usersFile('users/a', [['w1', null, 'a@example.com', null, 'yes']])),
      'incomplete',
      "User is missing 'Name' value in row 2"
    );
  });

  await test('treats an empty active cell as missing', () => {
    expectRowError(
      () => load(usersFile('users/a', [['w1', 'A', 'a@example.com', 'R1', null]])),
      'incomplete',
      "User is missing 'Active' value in row 2"
    );
  });

  await test('rejects an unknown workspace', () => {
    expectRowError(
      () => load(usersFile('users/a', [['w9', 'A', 'a@example.com', 'R1', 'yes']])),
      'unknown_workspace',
      "User at row 2 references an unknown workspace 'w9'"
    );
  });

  await test('rejects an unknown role template', () => {
    expectRowError(
      () => load(usersFile('users/a', [['w1', 'A', 'a@example.com', 'Guest', 'yes']])),
      'unknown_role',
      "User at row 2 references an unknown role template 'Guest'"
    );
  });

  await test('conflicting roles for one user cite the first file', () => {
    expectRowError(
      () => load(
        usersFile('users/first', [['w1', 'A', 'a@x.com', 'R1', 'yes']]),
        usersFile('users/second', [['w1', 'A', 'a@x.com', 'R2', 'yes']])
      ),
      'conflicting_role',
      "User at row 2 has conflicting role assignments of role 'R2' and 'R1'\n" +
      "First assigned in 'users/first'"
    );
  });

  await test('conflicting roles across different workspaces', () => {
    expectRowError(
      () => load(usersFile('users/first', [
        ['w1', 'A', 'a@x.com', 'R1', 'yes'],
        ['w2', 'A', 'a@x.com', 'R2', 'yes'],
      ])),
      'conflicting_role',
      "User at row 3 has conflicting role assignments of role 'R2' and 'R1'\n" +
      "First assigned in 'users/first'"
    );
  });

  await test('a repeated workspace assignment cites the first file', () => {
    expectRowError(
      () => load(
        usersFile('users/first', [['w1', 'A', 'a@x.com', 'R1', 'yes']]),
        usersFile('users/second', [['w2', 'B', 'b@x.com', 'R1', 'yes'], ['W1', 'A', 'A@X.COM', 'R1', 'yes']])
      ),
      'duplicate_assignment',
      "User at row 3 has multiple role assignments for workspace 'w1'\n" +
      "First assigned in 'users/first'"
    );
  });

  await test('warns when a later row disagrees on name or active flag', () => {
    const { users, warnings } = load(usersFile('users/a', [
      ['w1', 'Ann', 'a@x.com', 'R1', 'yes'],
      ['w2', 'Anne', 'a@x.com', 'R1', 'yes'],
    ]));
    assert.strictEqual(users.get('a@x.com')?.name, 'Ann');
    assert.deepStrictEqual(warnings, [
      "User 'a@x.com' at row 3 of 'users/a' differs in name or active flag from its first declaration, which is kept",
    ]);
  });

  await test('requires the Users sheet', () => {
    assert.throws(
      () => load(new MemoryWorkbook('users/a', { People: [HEADER] })),
      SheetNotFoundError
    );
  });

  console.log(`\n${passed} passed, ${failed} failed`);
  process.exit(failed > 0 ? 1 : 0);
}

runTests();
