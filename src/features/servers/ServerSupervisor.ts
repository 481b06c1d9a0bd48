import { EventEmitter } from 'events';
import { ExitStatus, RestartState, StateTransition, SupervisorState } from '../../../shared/types';
import { SupervisorContext } from '../../context';
import { errorMessage } from '../../utils/AppError';
import { sleep, Sleeper } from '../../utils/sleep';
import { BackupScheduler } from '../backups/BackupScheduler';
import { HealthProbe } from '../health/HealthProbe';
import { ProcessHandle, ProcessLauncher } from '../processes/ProcessLauncher';
import { buildLaunchCommand, describeCommand } from './LaunchCommand';
import { PreflightService } from './PreflightService';
import { ServerUpdater } from './ServerUpdater';

export interface SupervisorDeps {
    launcher: ProcessLauncher;
    preflight: Pick<PreflightService, 'run'>;
    backups?: Pick<BackupScheduler, 'snapshot' | 'run'>; // omitted when backups are disabled
    health?: Pick<HealthProbe, 'run'>;
    updater?: Pick<ServerUpdater, 'update'>;
    sleep?: Sleeper;
    clock?: () => number;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Owns the server process: STARTING -> RUNNING -> EXITED_CLEAN | EXITED_CRASH,
 * with RESTART_WAIT loops until TERMINAL_FAILURE or STOPPED_BY_SIGNAL.
 * Background probes and backups run beside the loop and share only the
 * metrics store, the log and the backup directory with it.
 *
 * Emits `transition` with a StateTransition for every state change.
 */
export class ServerSupervisor extends EventEmitter {
    private state: SupervisorState | null = null;
    private readonly restart: RestartState;
    private readonly controller = new AbortController();
    private readonly sleep: Sleeper;
    private readonly clock: () => number;
    private child: ProcessHandle | null = null;
    private stopRequested = false;
    private running = false;

    constructor(private readonly context: SupervisorContext, private readonly deps: SupervisorDeps) {
        super();
        const { restart } = context.config;
        this.restart = {
            attemptCount: 0,
            maxAttempts: restart.autoRestart ? restart.maxAttempts : 1,
            restartDelayMs: restart.delayMs
        };
        this.sleep = deps.sleep ?? sleep;
        this.clock = deps.clock ?? Date.now;
    }

    get currentState(): SupervisorState | null {
        return this.state;
    }

    get restartState(): Readonly<RestartState> {
        return { ...this.restart };
    }

    /**
     * Runs until the server exits cleanly, the restart budget is spent or a stop
     * is requested. Resolves with the process exit code for the supervisor.
     */
    async run(): Promise<number> {
        if (this.running) throw new Error('Supervisor is already running');
        this.running = true;

        const { logger } = this.context;
        const signal = this.controller.signal;

        logger.info('[Supervisor] ==========================================');
        logger.info(`[Supervisor] Supervising ${this.context.config.server.binary} on port ${this.context.config.server.port}`);
        logger.info('[Supervisor] ==========================================');

        if (this.deps.updater && !signal.aborted) {
            await this.deps.updater.update(signal);
        }

        const tasks: Promise<void>[] = [];
        if (this.deps.backups) tasks.push(this.supervise('BackupScheduler', this.deps.backups.run(signal)));
        if (this.deps.health) tasks.push(this.supervise('HealthProbe', this.deps.health.run(signal)));

        let exitCode: number;
        try {
            exitCode = await this.loop();
        } finally {
            // Cancel and join the background tasks whatever the outcome
            this.controller.abort();
            await Promise.all(tasks);
            this.running = false;
        }
        return exitCode;
    }

    /**
     * Graceful shutdown: no restart, child gets SIGTERM (SIGKILL after the grace period),
     * background tasks are cancelled. `run()` then resolves with 0.
     */
    stop(signal: NodeJS.Signals = 'SIGTERM'): void {
        const { logger, config } = this.context;
        if (this.stopRequested) {
            logger.warn(`[Supervisor] Already shutting down, ignoring ${signal}`);
            return;
        }
        this.stopRequested = true;
        logger.info(`[Supervisor] Received ${signal}, shutting down gracefully...`);
        this.controller.abort();

        const child = this.child;
        if (child) {
            logger.info('[Supervisor] Stopping server process...');
            child.kill('SIGTERM');

            const timeout = setTimeout(() => {
                logger.warn('[Supervisor] Server did not stop gracefully, forcing...');
                child.kill('SIGKILL');
            }, config.restart.stopTimeoutMs);
            void child.exited.then(() => clearTimeout(timeout));
        }
    }

    private async loop(): Promise<number> {
        const { logger, config, metrics } = this.context;
        let backupTaken = false;

        while (true) {
            if (this.stopRequested) return this.stopped();

            await this.transition('STARTING', `attempt ${this.restart.attemptCount + 1}/${this.restart.maxAttempts}`);
            logger.info(`[Supervisor] Starting server (Attempt: ${this.restart.attemptCount + 1}/${this.restart.maxAttempts})`);

            let status: ExitStatus;
            let runtimeMs = 0;
            try {
                await this.deps.preflight.run();

                if (!backupTaken && this.deps.backups) {
                    await this.deps.backups.snapshot();
                }
                backupTaken = true;
                if (this.stopRequested) return this.stopped();

                const command = await buildLaunchCommand(config.server);
                // A stop that landed while the command was being built has no child to kill yet
                if (this.stopRequested) return this.stopped();
                logger.info(`[Supervisor] Executing: ${describeCommand(command)}`);

                const child = this.deps.launcher.launch(command);
                this.child = child;
                await this.transition('RUNNING', child.pid !== undefined ? `pid ${child.pid}` : undefined);

                status = await child.exited;
                runtimeMs = this.clock() - child.startedAt.getTime();
                this.child = null;
            } catch (e) {
                logger.error(`[Supervisor] ${errorMessage(e)}`);
                status = { code: null, signal: null };
            }

            if (this.stopRequested) return this.stopped();

            if (status.code === 0) {
                this.restart.attemptCount = 0;
                await metrics.record('last_exit_code', 0);
                await this.transition('EXITED_CLEAN');
                logger.info('[Supervisor] Server exited normally');
                return EXIT_OK;
            }

            // Opt-in: a run longer than RESTART_RESET_AFTER clears earlier crashes
            const resetAfter = config.restart.resetAfterMs;
            if (resetAfter > 0 && runtimeMs >= resetAfter && this.restart.attemptCount > 0) {
                logger.info(`[Supervisor] Server ran ${Math.round(runtimeMs / 1000)}s before crashing, resetting restart counter`);
                this.restart.attemptCount = 0;
            }

            this.restart.attemptCount++;
            const reason = describeExit(status);
            await metrics.record('restart_attempts', this.restart.attemptCount);
            await metrics.record('last_exit_code', status.code ?? -1);
            await this.transition('EXITED_CRASH', reason);

            if (this.restart.attemptCount >= this.restart.maxAttempts) {
                await this.transition('TERMINAL_FAILURE');
                logger.error(`[Supervisor] Max restart attempts (${this.restart.maxAttempts}) reached. Server will not restart.`);
                await this.context.alerts.notify('CRITICAL: Max restart attempts reached. Server stopped.', 'critical');
                return EXIT_FAILURE;
            }

            logger.warn(
                `[Supervisor] Server crashed (${reason}), restarting in ${this.restart.restartDelayMs / 1000}s ` +
                `(${this.restart.attemptCount}/${this.restart.maxAttempts})`
            );

            if (this.deps.backups) {
                await this.deps.backups.snapshot();
            }
            backupTaken = true;
            if (this.stopRequested) return this.stopped();

            await this.transition('RESTART_WAIT');
            await this.sleep(this.restart.restartDelayMs, this.controller.signal);
        }
    }

    private async stopped(): Promise<number> {
        await this.transition('STOPPED_BY_SIGNAL');
        this.context.logger.info('[Supervisor] Server stopped by signal');
        return EXIT_OK;
    }

    private async transition(to: SupervisorState, reason?: string): Promise<void> {
        const event: StateTransition = {
            from: this.state,
            to,
            attempt: this.restart.attemptCount,
            at: new Date(this.clock()).toISOString(),
            reason
        };
        this.state = to;
        this.context.logger.info(`[Supervisor] ${event.from ?? 'INIT'} -> ${to}${reason ? ` (${reason})` : ''}`);
        this.emit('transition', event);
        await this.context.metrics.record('supervisor_state', to);
    }

    // Background task errors are logged, never lost
    private supervise(name: string, task: Promise<void>): Promise<void> {
        return task.catch((e) => {
            this.context.logger.error(`[Supervisor] Background task ${name} failed: ${errorMessage(e)}`);
        });
    }
}

function describeExit(status: ExitStatus): string {
    if (status.signal) return `killed by ${status.signal}`;
    if (status.code === null) return 'failed to start';
    return `exit code ${status.code}`;
}
