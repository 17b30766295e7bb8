/**
 * Action Command
 *
 * Runs as a GitHub Actions step: reads `INPUT_*` and the workflow event,
 * sets step outputs. Same as the `action.ts` entry point.
 */

import type { Command } from 'commander';
import { ActionHost } from '../host/ActionHost.js';

export function registerActionCommand(program: Command): void {
  program
    .command('action')
    .description('Run as a GitHub Actions step (reads step inputs from the runner)')
    .action(async () => {
      process.exitCode = await ActionHost.run();
    });
}
