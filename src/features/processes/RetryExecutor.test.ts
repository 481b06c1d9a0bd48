import { describe, expect, it, vi } from 'vitest';
import { CommandSpec } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { CommandOutcome, CommandRunOptions } from './CommandRunner';
import { RetryExecutor } from './RetryExecutor';

const command: CommandSpec = { file: '/opt/steamcmd/steamcmd.sh', args: ['+quit'] };

function scriptedRunner(exitCodes: number[]) {
    let call = 0;
    const runner = vi.fn(async (_command: CommandSpec, _options?: CommandRunOptions): Promise<CommandOutcome> => {
        const exitCode = exitCodes[Math.min(call, exitCodes.length - 1)];
        call++;
        return { exitCode, timedOut: false };
    });
    return runner;
}

describe('RetryExecutor', () => {
    const logger = new Logger({ quiet: true });

    it('gives up after exactly maxAttempts with doubling delays', async () => {
        const runner = scriptedRunner([3]);
        const delays: number[] = [];
        const executor = new RetryExecutor(logger, { runner, sleep: async (ms) => { delays.push(ms); } });

        const result = await executor.execute(command, { maxAttempts: 4, initialDelayMs: 100 });

        expect(result).toEqual({ ok: false, attemptsUsed: 4, lastExitCode: 3 });
        expect(runner).toHaveBeenCalledTimes(4);
        expect(delays).toEqual([100, 200, 400]);
    });

    it('stops at the first successful attempt', async () => {
        const runner = scriptedRunner([8, 0]);
        const delays: number[] = [];
        const executor = new RetryExecutor(logger, { runner, sleep: async (ms) => { delays.push(ms); } });

        const result = await executor.execute(command, { maxAttempts: 3, initialDelayMs: 5000 });

        expect(result).toEqual({ ok: true, attempts: 2 });
        expect(delays).toEqual([5000]);
    });

    it('runs a single attempt without sleeping', async () => {
        const runner = scriptedRunner([1]);
        const sleep = vi.fn(async () => undefined);
        const executor = new RetryExecutor(logger, { runner, sleep });

        const result = await executor.execute(command, { maxAttempts: 1, initialDelayMs: 100 });

        expect(result).toEqual({ ok: false, attemptsUsed: 1, lastExitCode: 1 });
        expect(sleep).not.toHaveBeenCalled();
    });

    it('stops retrying once the signal aborts', async () => {
        const runner = scriptedRunner([1]);
        const controller = new AbortController();
        const executor = new RetryExecutor(logger, {
            runner,
            sleep: async () => { controller.abort(); }
        });

        const result = await executor.execute(command, {
            maxAttempts: 5,
            initialDelayMs: 100,
            signal: controller.signal
        });

        expect(result).toEqual({ ok: false, attemptsUsed: 1, lastExitCode: 1 });
        expect(runner).toHaveBeenCalledTimes(1);
    });

    it('passes the timeout through to the runner', async () => {
        const runner = scriptedRunner([0]);
        const executor = new RetryExecutor(logger, { runner });

        await executor.execute(command, { maxAttempts: 1, initialDelayMs: 0, timeoutMs: 1500 });

        expect(runner.mock.calls[0][0]).toBe(command);
        expect(runner.mock.calls[0][1]).toMatchObject({ timeoutMs: 1500 });
    });
});
