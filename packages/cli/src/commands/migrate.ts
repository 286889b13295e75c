import {
  ConsoleLogger,
  DiscoveryModeSchema,
  UsageError,
  type ConfigInput,
  type LogLevel,
} from '@snakify/shared';
import { ConfigLoader, migrate, type MigrateDeps, type MigrationReport } from '@snakify/migrate';
import { OutputRenderer } from '../output/renderer';

export interface MigrateCommandOptions {
  mode?: string;
  exclude?: string[];
  dryRun?: boolean;
  journal?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

function logLevel(options: MigrateCommandOptions): LogLevel {
  if (options.json) return 'silent';
  return options.verbose ? 'debug' : 'info';
}

function parseMode(mode: string | undefined): ConfigInput['mode'] {
  if (mode === undefined) return undefined;
  const parsed = DiscoveryModeSchema.safeParse(mode);
  if (!parsed.success) {
    throw new UsageError(`Invalid --mode "${mode}". Must be walk or glob.`);
  }
  return parsed.data;
}

export async function runMigrateCommand(
  dir: string,
  options: MigrateCommandOptions,
  deps: Omit<MigrateDeps, 'logger'> = {},
): Promise<MigrationReport> {
  const renderer = new OutputRenderer(!!options.json);

  const config = ConfigLoader.load({
    configPath: options.config,
    flags: {
      root: dir,
      mode: parseMode(options.mode),
      excludes: options.exclude,
      dryRun: options.dryRun,
      journal: options.journal,
    },
  });

  const report = await migrate(config, {
    ...deps,
    logger: new ConsoleLogger({ level: logLevel(options) }),
  });
  renderer.render(report);
  return report;
}
