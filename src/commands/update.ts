import { Command } from 'commander';

import type { UpdateOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { loadConfig } from '../core/config.js';
import { loadRegistry } from '../core/registry/recipe-registry.js';
import { PinUpdater, type PinReport } from '../core/update/pin-updater.js';
import { getCliOutput, getWorkingDir } from '../cli/context.js';
import type { OutputPort } from '../core/ports/output.js';

function printReport(out: OutputPort, report: PinReport): void {
  switch (report.status) {
    case 'updated':
      out.success(`${report.name}: ${report.from} -> ${report.to}`);
      break;
    case 'current':
      out.message(`${report.name}: up to date`);
      break;
    case 'manual':
      out.warn(`${report.name}: needs a manual check (${report.reason})`);
      break;
    case 'failed':
      out.error(`${report.name}: ${report.reason}`);
      break;
  }
}

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('move recipe commit pins to the newest upstream revision')
    .argument('[recipes...]', 'recipes to update (default: all)')
    .option('--dry-run', 'report new pins without writing recipe files')
    .action(
      withErrorHandling(async (names: string[], options: UpdateOptions, command: Command) => {
        const config = await loadConfig(getWorkingDir(command));
        const registry = await loadRegistry(config.recipePaths);
        const out = getCliOutput();

        const reports = await new PinUpdater().updatePins(registry, names, {
          dryRun: options.dryRun,
          onReport: report => printReport(out, report)
        });

        const count = (status: PinReport['status']): number => reports.filter(report => report.status === status).length;
        out.info(
          `${count('updated')} updated, ${count('current')} current, ${count('manual')} manual, ${count('failed')} failed`
        );
      })
    );
}
