import { spawn } from 'child_process';
import { CommandSpec, ExitStatus } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { SPAWN_FAILURE_EXIT_CODE } from './CommandRunner';

export interface ProcessHandle {
    readonly pid: number | undefined;
    readonly startedAt: Date;
    readonly exited: Promise<ExitStatus>;
    kill(signal?: NodeJS.Signals): boolean;
}

export interface ProcessLauncher {
    launch(command: CommandSpec): ProcessHandle;
}

/**
 * Launches the supervised server and tees its output into the log sink.
 */
export class NativeProcessLauncher implements ProcessLauncher {
    constructor(private readonly logger: Logger) {}

    launch(command: CommandSpec): ProcessHandle {
        const child = spawn(command.file, command.args, {
            cwd: command.cwd,
            env: { ...process.env, ...command.env },
            shell: false,
            stdio: ['ignore', 'pipe', 'pipe']
        });

        const forward = (data: Buffer) => {
            for (const line of data.toString().split(/\r?\n/)) {
                if (line.length > 0) this.logger.raw(line);
            }
        };
        child.stdout?.on('data', forward);
        child.stderr?.on('data', forward);

        const exited = new Promise<ExitStatus>((resolve) => {
            let done = false;
            child.on('error', (err) => {
                this.logger.error(`[ProcessLauncher] Failed to spawn ${command.file}: ${err.message}`);
                if (!done) {
                    done = true;
                    resolve({ code: SPAWN_FAILURE_EXIT_CODE, signal: null });
                }
            });
            child.on('close', (code, signal) => {
                if (!done) {
                    done = true;
                    resolve({ code, signal });
                }
            });
        });

        return {
            pid: child.pid,
            startedAt: new Date(),
            exited,
            kill: (signal: NodeJS.Signals = 'SIGTERM') => child.kill(signal)
        };
    }
}
