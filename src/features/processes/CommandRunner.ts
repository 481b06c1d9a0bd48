import { spawn } from 'child_process';
import os from 'os';
import { CommandSpec } from '../../../shared/types';

export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface CommandRunOptions {
    onOutput?: (chunk: string) => void;
    timeoutMs?: number;
    signal?: AbortSignal;
}

export interface CommandOutcome {
    exitCode: number;
    timedOut: boolean;
}

export type CommandRunner = (command: CommandSpec, options?: CommandRunOptions) => Promise<CommandOutcome>;

/**
 * Spawns a command from a discrete argument list (never through a shell)
 * and resolves with its exit code. Spawn errors resolve as exit 127.
 */
export const runCommand: CommandRunner = (command, options = {}) => {
    return new Promise((resolve) => {
        let settled = false;
        let timedOut = false;
        let timer: NodeJS.Timeout | null = null;

        const finish = (exitCode: number) => {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);
            options.signal?.removeEventListener('abort', onAbort);
            resolve({ exitCode, timedOut });
        };

        const child = spawn(command.file, command.args, {
            cwd: command.cwd,
            env: { ...process.env, ...command.env },
            shell: false,
            stdio: ['ignore', 'pipe', 'pipe']
        });

        const onAbort = () => child.kill('SIGTERM');

        child.stdout?.on('data', (data: Buffer) => options.onOutput?.(data.toString()));
        child.stderr?.on('data', (data: Buffer) => options.onOutput?.(data.toString()));

        child.on('error', (err) => {
            options.onOutput?.(`${command.file}: ${err.message}\n`);
            finish(SPAWN_FAILURE_EXIT_CODE);
        });

        child.on('close', (code, signal) => {
            // Killed by a signal: report as 128 + n like a shell would
            if (code === null && signal) return finish(128 + (os.constants.signals[signal] ?? 0));
            finish(code ?? 1);
        });

        if (options.timeoutMs && options.timeoutMs > 0) {
            timer = setTimeout(() => {
                timedOut = true;
                child.kill('SIGKILL');
            }, options.timeoutMs);
        }

        if (options.signal?.aborted) onAbort();
        else options.signal?.addEventListener('abort', onAbort, { once: true });
    });
};
