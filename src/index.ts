#!/usr/bin/env node
/**
 * gamesup: supervisor for a dedicated game server.
 *
 * Usage:
 *   gamesup start [--no-update]
 *   gamesup health [--once] [--interval <s>]
 *   gamesup backup create|list|cleanup|restore <file>
 *
 * Every setting comes from the environment (or a .env file beside the process).
 */

import dotenv from 'dotenv';
import { Command } from 'commander';
import { loadConfig } from './config';
import { createContext, SupervisorContext } from './context';
import { buildBackupScheduler, buildHealthProbe, buildSupervisor } from './bootstrap';
import { installGlobalHandlers, onShutdownSignal } from './lifecycle';
import { AppError, errorMessage } from './utils/AppError';

dotenv.config();

// ──────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────

function withContext(action: (context: SupervisorContext) => Promise<number>): () => Promise<void> {
    return async () => {
        const context = createContext(loadConfig());
        let code: number;
        try {
            code = await action(context);
        } catch (e) {
            const prefix = e instanceof AppError ? `[${e.errorCode}] ` : '';
            context.logger.error(`${prefix}${errorMessage(e)}`);
            code = 1;
        }
        context.logger.close();
        process.exit(code);
    };
}

// ──────────────────────────────────────────────
// CLI
// ──────────────────────────────────────────────

const program = new Command();
program
    .name('gamesup')
    .description('Dedicated game server supervisor: restarts, backups, health checks and alerts')
    .version('1.0.0');

program
    .command('start')
    .description('Run the server under supervision until it exits cleanly, fails terminally or is signalled')
    .option('--no-update', 'Skip the SteamCMD update before the first start')
    .action((options: { update: boolean }) => withContext(async (context) => {
        installGlobalHandlers(context.logger);
        const supervisor = buildSupervisor(context, { update: options.update });
        onShutdownSignal(signal => supervisor.stop(signal));
        return supervisor.run();
    })());

program
    .command('health')
    .description('Run health checks against the server process')
    .option('--once', 'Run a single check cycle and print the verdict')
    .option('--interval <seconds>', 'Seconds between checks', '60')
    .action((options: { once?: boolean; interval: string }) => withContext(async (context) => {
        const intervalSeconds = parseInt(options.interval, 10);
        if (isNaN(intervalSeconds) || intervalSeconds <= 0) {
            throw new AppError('E_CONFIG', `Invalid interval: ${options.interval}`);
        }

        const probe = buildHealthProbe(context, { intervalMs: intervalSeconds * 1000, checkImmediately: true });
        if (options.once) {
            const verdict = await probe.runCycle();
            context.logger.raw(JSON.stringify(verdict, null, 2));
            return verdict.processAlive && verdict.portListening ? 0 : 1;
        }

        installGlobalHandlers(context.logger);
        const controller = new AbortController();
        onShutdownSignal(signal => {
            context.logger.info(`Received ${signal}, stopping health monitor...`);
            controller.abort();
        });
        await probe.run(controller.signal);
        return 0;
    })());

const backup = program
    .command('backup')
    .description('Manage server backups');

backup
    .command('create')
    .description('Take a snapshot now')
    .action(() => withContext(async (context) => {
        const result = await buildBackupScheduler(context).snapshot();
        return result.ok ? 0 : 1;
    })());

backup
    .command('list')
    .description('List retained backups, newest first')
    .action(() => withContext(async (context) => {
        const backups = await buildBackupScheduler(context).list();
        if (backups.length === 0) {
            context.logger.info('No backups found');
            return 0;
        }
        for (const record of backups) {
            const uploaded = record.uploaded ? ' [uploaded]' : '';
            context.logger.raw(`${record.filename}  ${record.sizeBytes} bytes  ${record.createdAt}${uploaded}`);
        }
        return 0;
    })());

backup
    .command('cleanup')
    .description('Apply the retention policy')
    .action(() => withContext(async (context) => {
        const removed = await buildBackupScheduler(context).cleanup();
        context.logger.info(`Removed ${removed} backup(s)`);
        return 0;
    })());

backup
    .command('restore <file>')
    .description('Restore a backup over the server directory (takes a safety snapshot first)')
    .action((file: string) => withContext(async (context) => {
        const record = await buildBackupScheduler(context).restore(file);
        context.logger.success(`Restored ${record.filename}`);
        return 0;
    })());

// ──────────────────────────────────────────────
// Entry Point
// ──────────────────────────────────────────────

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error(`Fatal: ${errorMessage(e)}`);
    process.exit(1);
});
