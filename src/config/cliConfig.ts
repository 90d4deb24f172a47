import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { DEFAULT_CONFIG, type GameConfig } from '../config';

function seedFromEnv(): number {
  const raw = process.env.GAME_SEED;
  if (raw === undefined || raw.trim() === '') return DEFAULT_CONFIG.seed;
  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : DEFAULT_CONFIG.seed;
}

// Parse command line arguments over the defaults
export function parseCommandLineArgs(args: string[] = hideBin(process.argv)): GameConfig {
  const argv = yargs(args)
    .scriptName('arcane-trials')
    .option('seed', {
      type: 'number',
      description: 'Seed for the random source (same seed, same game)',
      default: seedFromEnv(),
      alias: 's',
    })
    .option('name', {
      type: 'string',
      description: 'Name of the player character',
      default: DEFAULT_CONFIG.playerName,
      alias: 'n',
    })
    .option('logLevel', {
      type: 'string',
      description: 'Log level (debug, info, warn, error)',
      default: process.env.LOG_LEVEL || DEFAULT_CONFIG.logLevel,
      alias: 'l',
    })
    .option('logDir', {
      type: 'string',
      description: 'Directory for rotated log files',
      default: DEFAULT_CONFIG.logDir,
    })
    .option('logToFile', {
      type: 'boolean',
      description: 'Write rotated log files in addition to the console',
      default: DEFAULT_CONFIG.logToFile,
    })
    .option('tickInterval', {
      type: 'number',
      description: 'World update interval in milliseconds',
      default: DEFAULT_CONFIG.tickInterval,
    })
    .option('refreshInterval', {
      type: 'number',
      description: 'Presentation refresh interval in milliseconds',
      default: DEFAULT_CONFIG.refreshInterval,
    })
    .check((parsed) => {
      if (!Number.isInteger(parsed.seed)) {
        throw new Error('--seed must be an integer');
      }
      if (parsed.tickInterval <= 0 || parsed.refreshInterval <= 0) {
        throw new Error('intervals must be positive');
      }
      return true;
    })
    .strict()
    .help()
    .alias('help', 'h')
    .parseSync();

  return {
    seed: argv.seed,
    playerName: argv.name,
    tickInterval: argv.tickInterval,
    refreshInterval: argv.refreshInterval,
    logLevel: argv.logLevel,
    logDir: argv.logDir,
    logToFile: argv.logToFile,
  };
}
