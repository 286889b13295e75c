import pc from 'picocolors';
import { AppError } from '@snakify/shared';
import type { MigrationReport } from '@snakify/migrate';

const MAX_LISTED = 20;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(report: MigrationReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      this.renderHuman(report);
    }
  }

  private renderHuman(report: MigrationReport): void {
    if (report.dryRun) {
      console.log(`\n${pc.yellow('Dry run: no files were changed.')}`);
    } else {
      console.log(`\n${pc.green('✅ Migration complete.')}`);
    }

    const renames = report.files.filter((file) => file.renamed);
    if (renames.length > 0) {
      console.log(pc.bold(report.dryRun ? '\nWould rename:' : '\nRenamed:'));
      renames.slice(0, MAX_LISTED).forEach((file) => console.log(`  - ${file.from} -> ${file.to}`));
      if (renames.length > MAX_LISTED) {
        console.log(`  ... and ${renames.length - MAX_LISTED} more.`);
      }
    }

    console.log(pc.bold('\nSummary:'));
    console.log(`  Root: ${report.root}`);
    console.log(`  Mode: ${report.mode}`);
    console.log(
      `  ${report.rewrittenCount} rewritten, ${report.renamedCount} renamed, ${report.unchangedCount} unchanged`,
    );
    console.log(`  Run ID: ${report.runId}`);
  }

  error(e: unknown, verbose = false): void {
    if (this.isJson) {
      const error =
        e instanceof AppError
          ? { code: e.code, message: e.message, details: e.details }
          : { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) };
      console.log(JSON.stringify({ error }));
      return;
    }

    console.error(pc.red(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`));
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }
}
