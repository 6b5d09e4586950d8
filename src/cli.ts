import { boolean, command, flag, option, optional, string, subcommands } from 'cmd-ts';
import { APP_NAME, APP_VERSION, AppConfig, ConfigOverrides, resolveConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { connectJellyfin } from './jellyfin/client';
import { logger } from './services/structuredLogging';
import { performBackup } from './tasks/backup';
import { performFindMissing } from './tasks/findMissing';
import { performRestore } from './tasks/restore';
import { TvdbClient } from './tvdb/client';

const connectionArgs = {
  server: option({
    type: optional(string),
    long: 'server',
    description: 'Jellyfin server URL, e.g. http://localhost:8096 (env: JELLYFIN_SERVER)',
  }),
  apiKey: option({
    type: optional(string),
    long: 'apikey',
    description: 'Jellyfin API key (env: JELLYFIN_API_KEY)',
  }),
  user: option({
    type: optional(string),
    long: 'user',
    description: 'Jellyfin user name (env: JELLYFIN_USER)',
  }),
};

const fileArg = option({
  type: optional(string),
  long: 'file',
  short: 'f',
  description: 'Backup file path (env: BACKUP_FILE, default: ./backup.json)',
});

/**
 * Run a command body, turning any error into a log line and exit code 1.
 */
async function runTask(label: string, task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('cli', `Configuration error: ${error.message}`);
    } else {
      logger.error('cli', `${label} failed: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
}

function loadConfig(overrides: ConfigOverrides): AppConfig {
  return resolveConfig(overrides);
}

export const backupCommand = command({
  name: 'backup',
  description: 'Save the watched movies and episodes of a user to a backup file',
  args: { ...connectionArgs, file: fileArg },
  handler: (args) =>
    runTask('Backup', async () => {
      const config = loadConfig(args);
      const client = await connectJellyfin(config.jellyfin, config.requestTimeoutMs);
      await performBackup(client, config.backupFile);
    }),
});

export const restoreCommand = command({
  name: 'restore',
  description: 'Mark the items of a backup file as watched for a user',
  args: { ...connectionArgs, file: fileArg },
  handler: (args) =>
    runTask('Restore', async () => {
      const config = loadConfig(args);
      const client = await connectJellyfin(config.jellyfin, config.requestTimeoutMs);
      await performRestore(client, config.backupFile);
    }),
});

export const findMissingCommand = command({
  name: 'find-missing',
  description: 'List aired episodes known to TVDB that are missing from the library',
  args: {
    ...connectionArgs,
    tvdbApiKey: option({
      type: optional(string),
      long: 'tvdb-apikey',
      description: 'TVDB API key (env: TVDB_API_KEY)',
    }),
    includeSpecials: flag({
      type: boolean,
      long: 'include-specials',
      description: 'Include specials (season 0) in the check',
    }),
  },
  handler: (args) =>
    runTask('Find missing episodes', async () => {
      const config = loadConfig(args);
      if (!config.tvdbApiKey) {
        throw new ConfigError('TVDB API key required for finding missing episodes (--tvdb-apikey or TVDB_API_KEY)');
      }
      const jellyfin = await connectJellyfin(config.jellyfin, config.requestTimeoutMs);
      const tvdb = new TvdbClient(config.tvdbApiKey, { timeoutMs: config.requestTimeoutMs });
      await performFindMissing(jellyfin, tvdb, args.includeSpecials);
    }),
});

export const cli = subcommands({
  name: APP_NAME,
  description: 'Back up and restore Jellyfin watch-state, and find missing episodes using TVDB',
  version: APP_VERSION,
  cmds: {
    backup: backupCommand,
    restore: restoreCommand,
    'find-missing': findMissingCommand,
  },
});
