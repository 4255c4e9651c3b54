#!/usr/bin/env node
/**
 * profile-store CLI
 *
 * Operator commands against a file-backed store:
 *   profile-store --root ./data inspect <ownerId>
 *   profile-store --root ./data versions <ownerId> --limit 5
 *   profile-store --root ./data unlock <ownerId>
 */

import { Command } from 'commander';
import { configFromEnv, ProfileAdmin } from '../profile-store';
import { FileRemoteStore, type RemoteStore } from '../remote-store';
import { VERSION } from '../version';

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export interface GlobalOptions {
  root: string;
  store?: string;
  storeVersion?: string;
}

export function createAdmin(
  store: RemoteStore,
  options: Omit<GlobalOptions, 'root'>,
  env: NodeJS.ProcessEnv = process.env
): ProfileAdmin {
  const config = configFromEnv(env);
  if (options.store) config.storeName = options.store;
  if (options.storeVersion) config.storeVersion = options.storeVersion;
  return new ProfileAdmin(store, config);
}

export async function inspectCommand(admin: ProfileAdmin, ownerId: string, out: CliOutput): Promise<number> {
  const inspection = await admin.inspect(ownerId);
  if (!inspection) {
    out.error(`No profile stored for ${ownerId}`);
    return 1;
  }

  const { metadata } = inspection;
  out.log(`Profile:  ${ownerId}`);
  out.log(`Version:  ${inspection.version}`);
  out.log(`Created:  ${new Date(metadata.createdAt).toISOString()}`);
  out.log(`Sessions: ${metadata.sessions}`);
  if (metadata.sessionData) {
    const stale = inspection.lockStale ? ' (stale)' : '';
    out.log(`Lock:     ${metadata.sessionData.ownerToken}, ${inspection.lockAgeMs}ms old${stale}`);
  } else {
    out.log('Lock:     none');
  }
  out.log(JSON.stringify(metadata.data, null, 2));
  return 0;
}

export async function versionsCommand(
  admin: ProfileAdmin,
  ownerId: string,
  limit: number,
  out: CliOutput
): Promise<number> {
  const versions = await admin.listVersions(ownerId, limit);
  if (versions.length === 0) {
    out.error(`No versions stored for ${ownerId}`);
    return 1;
  }
  for (const version of versions) {
    out.log(`${version}  ${new Date(version).toISOString()}`);
  }
  return 0;
}

export async function unlockCommand(admin: ProfileAdmin, ownerId: string, out: CliOutput): Promise<number> {
  const result = await admin.forceUnlock(ownerId);
  if (!result.unlocked) {
    out.log(`${ownerId} is not locked`);
    return 0;
  }
  out.log(`Released lock held by ${result.previousOwner}, new version ${result.version}`);
  return 0;
}

export function createProgram(out: CliOutput, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('profile-store')
    .description('Inspect and repair stored profiles')
    .version(VERSION)
    .option('-r, --root <dir>', 'Store root directory', './data')
    .option('-s, --store <name>', 'Store name (default: PROFILE_STORE_NAME or "profiles")')
    .option('--store-version <version>', 'Store schema version');

  const run = async (command: (admin: ProfileAdmin) => Promise<number>) => {
    const options = program.opts<GlobalOptions>();
    const admin = createAdmin(new FileRemoteStore(options.root), options);
    try {
      setExitCode(await command(admin));
    } catch (error) {
      out.error(`${colors.red}❌ ${error instanceof Error ? error.message : String(error)}${colors.reset}`);
      setExitCode(1);
    }
  };

  program
    .command('inspect <ownerId>')
    .description('Show the latest version of a profile')
    .action((ownerId: string) => run(admin => inspectCommand(admin, ownerId, out)));

  program
    .command('versions <ownerId>')
    .description('List stored versions, newest first')
    .option('-l, --limit <n>', 'Number of versions', '20')
    .action((ownerId: string, options: { limit: string }) => {
      const limit = parseInt(options.limit, 10);
      return run(admin => versionsCommand(admin, ownerId, Number.isFinite(limit) && limit > 0 ? limit : 20, out));
    });

  program
    .command('unlock <ownerId>')
    .description('Clear a session lock left by a dead process')
    .action((ownerId: string) =>
      run(async admin => {
        out.log(`${colors.yellow}⚠️  Only unlock profiles whose holder is gone${colors.reset}`);
        const code = await unlockCommand(admin, ownerId, out);
        if (code === 0) out.log(`${colors.green}✅ Done${colors.reset}`);
        return code;
      })
    );

  return program;
}

if (require.main === module) {
  const program = createProgram(
    { log: message => console.log(message), error: message => console.error(message) },
    code => {
      process.exitCode = code;
    }
  );
  program.parseAsync(process.argv).catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
}
