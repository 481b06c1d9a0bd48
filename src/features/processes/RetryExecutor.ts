import { CommandSpec } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { sleep, Sleeper } from '../../utils/sleep';
import { CommandRunner, runCommand } from './CommandRunner';

export interface RetryOptions {
    maxAttempts: number;
    initialDelayMs: number;
    label?: string;
    timeoutMs?: number; // per attempt
    signal?: AbortSignal;
}

export type RetryResult =
    | { ok: true; attempts: number }
    | { ok: false; attemptsUsed: number; lastExitCode: number };

export interface RetryExecutorDeps {
    runner?: CommandRunner;
    sleep?: Sleeper;
}

/**
 * Runs a command until it exits 0 or the attempt budget is spent.
 * Delay before attempt k (k >= 2) is initialDelayMs * 2^(k-2).
 * A failing command never throws: the caller decides whether failure is fatal.
 */
export class RetryExecutor {
    private readonly runner: CommandRunner;
    private readonly sleep: Sleeper;

    constructor(private readonly logger: Logger, deps: RetryExecutorDeps = {}) {
        this.runner = deps.runner ?? runCommand;
        this.sleep = deps.sleep ?? sleep;
    }

    async execute(command: CommandSpec, options: RetryOptions): Promise<RetryResult> {
        const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
        const label = options.label ?? command.file;
        let delay = options.initialDelayMs;
        let lastExitCode = 0;
        let attemptsUsed = 0;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (options.signal?.aborted) break;

            this.logger.info(`[RetryExecutor] ${label} attempt ${attempt}/${maxAttempts}`);

            const outcome = await this.runner(command, {
                onOutput: (chunk) => this.logger.raw(chunk.replace(/\n$/, '')),
                timeoutMs: options.timeoutMs,
                signal: options.signal
            });
            attemptsUsed = attempt;

            if (outcome.exitCode === 0) {
                this.logger.success(`[RetryExecutor] ${label} completed successfully`);
                return { ok: true, attempts: attempt };
            }

            lastExitCode = outcome.exitCode;
            const reason = outcome.timedOut ? 'timed out' : `exit ${outcome.exitCode}`;

            if (attempt < maxAttempts) {
                this.logger.warn(`[RetryExecutor] ${label} failed (${reason}), retrying in ${delay / 1000}s...`);
                await this.sleep(delay, options.signal);
                delay *= 2;
            } else {
                this.logger.warn(`[RetryExecutor] ${label} failed (${reason})`);
            }
        }

        this.logger.error(`[RetryExecutor] ${label} failed after ${attemptsUsed} attempt(s)`);
        return { ok: false, attemptsUsed, lastExitCode };
    }
}
