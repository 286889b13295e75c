import { Command, Option } from 'commander';
import { version } from '../package.json';
import { runMigrateCommand, type MigrateCommandOptions } from './commands/migrate';

export const name = '@snakify/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('snakify')
    .description('Rename CamelCase C++ sources to snake_case and fix the references to them')
    .version(version)
    .argument('<dir>', 'Directory to migrate')
    .addOption(
      new Option('--mode <mode>', 'How files are discovered').choices(['walk', 'glob']),
    )
    .option('--exclude <pattern...>', 'gitignore-style patterns to skip')
    .option('--dry-run', 'Report the changes without touching any file')
    .option('--journal <file>', 'Append one JSON line per committed step to this file')
    .option('--config <path>', 'Path to configuration file')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .action(async (dir: string, options: MigrateCommandOptions) => {
      await runMigrateCommand(dir, options);
    });

  return program;
}
