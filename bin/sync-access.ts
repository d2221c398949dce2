#!/usr/bin/env node
/**
 * Synchronize workspaces, roles and users
 *
 * Reads the desired state from a data directory of CSV workbooks and brings
 * the access-management API in line with it, asking before every change.
 *
 * Usage:
 *   npx tsx bin/sync-access.ts \
 *     --url https://access.example.com \
 *     --credentials credentials.json \
 *     ./data
 */

import { Command, InvalidArgumentError } from 'commander';
import path from 'node:path';
import { DEFAULT_COLUMNS, DEFAULT_LAYOUT, readCredentials } from '../src/config.js';
import { SyncError } from '../src/errors.js';
import { loadDesiredState } from '../src/loader/desiredState.js';
import { createLogger } from '../src/logger.js';
import { AutoApproveGate, PromptApprovalGate } from '../src/reconcile/approvalGate.js';
import { synchronize } from '../src/reconcile/synchronize.js';
import { AccessApiClient } from '../src/remote/accessApiClient.js';
import { SyncReporter } from '../src/ui/syncReporter.js';

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('access-sync')
  .description('Synchronize workspaces, roles and users of an access-management API')
  .argument('<data>', 'directory containing workspace, role, and user records')
  .requiredOption('-u, --url <url>', 'the base URL to use when making requests to the API')
  .requiredOption('-c, --credentials <path>', 'path to API credentials file')
  .option('--workspaces-file <name>', 'workbook containing desired workspaces (within data directory)', DEFAULT_LAYOUT.workspacesFile)
  .option('--workspace-slug-column <name>', "column containing the workspace 'slug' field", DEFAULT_COLUMNS.workspaces.slug)
  .option('--workspace-name-column <name>', "column containing the workspace 'name' field", DEFAULT_COLUMNS.workspaces.name)
  .option('--roles-file <name>', 'workbook containing desired role templates (within data directory)', DEFAULT_LAYOUT.rolesFile)
  .option('--users-directory <name>', 'directory containing user workbooks (within data directory)', DEFAULT_LAYOUT.usersDirectory)
  .option('--user-workspace-column <name>', "column containing the 'slug' of the primary workspace", DEFAULT_COLUMNS.users.workspace)
  .option('--user-name-column <name>', "column containing the user 'name' field", DEFAULT_COLUMNS.users.name)
  .option('--user-email-column <name>', "column containing the user 'email' field", DEFAULT_COLUMNS.users.email)
  .option('--user-role-column <name>', 'column containing the name of the desired role template', DEFAULT_COLUMNS.users.role)
  .option('--user-active-column <name>', "column containing the user 'active' field", DEFAULT_COLUMNS.users.active)
  .option('-y, --yes', 'apply changes without asking for confirmation')
  .option('--concurrency <n>', 'number of changes applied in parallel', parsePositiveInt, 1)
  .option('--quiet', 'suppress progress output')
  .parse(process.argv);

const opts = program.opts<{
  url: string;
  credentials: string;
  workspacesFile: string;
  workspaceSlugColumn: string;
  workspaceNameColumn: string;
  rolesFile: string;
  usersDirectory: string;
  userWorkspaceColumn: string;
  userNameColumn: string;
  userEmailColumn: string;
  userRoleColumn: string;
  userActiveColumn: string;
  yes?: boolean;
  concurrency: number;
  quiet?: boolean;
}>();

const dataDir = path.resolve(program.args[0]);
const logger = createLogger({ quiet: opts.quiet });

async function main() {
  const credentials = readCredentials(path.resolve(opts.credentials));
  const api = new AccessApiClient({ baseUrl: opts.url, credentials });

  logger.heading('Reading Desired State...');
  const desired = loadDesiredState({
    dataDir,
    layout: {
      workspacesFile: opts.workspacesFile,
      rolesFile: opts.rolesFile,
      usersDirectory: opts.usersDirectory,
    },
    columns: {
      workspaces: {
        slug: opts.workspaceSlugColumn,
        name: opts.workspaceNameColumn,
      },
      users: {
        workspace: opts.userWorkspaceColumn,
        name: opts.userNameColumn,
        email: opts.userEmailColumn,
        role: opts.userRoleColumn,
        active: opts.userActiveColumn,
      },
    },
  });
  logger.success(`Found ${desired.workspaces.size} workspaces`);
  logger.success(`Found ${desired.roleTemplates.size} role templates`);
  logger.success(`Found ${desired.users.size} users`);
  for (const warning of desired.warnings) {
    logger.warn(`  ⚠ ${warning}`);
  }

  await synchronize(api, desired, {
    gate: opts.yes ? new AutoApproveGate() : new PromptApprovalGate(),
    reporter: new SyncReporter(logger, opts.quiet),
    concurrency: opts.concurrency,
  });
}

main().catch((err: unknown) => {
  if (err instanceof SyncError) {
    logger.failure(err.message, err.detail);
  } else {
    logger.failure(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
