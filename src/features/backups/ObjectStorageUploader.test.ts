import { describe, expect, it, vi } from 'vitest';
import { CommandSpec } from '../../../shared/types';
import { CommandOutcome, CommandRunOptions } from '../processes/CommandRunner';
import { AwsCliUploader } from './ObjectStorageUploader';

function fakeRunner(outcome: CommandOutcome, output = '') {
    return vi.fn(async (_command: CommandSpec, options?: CommandRunOptions): Promise<CommandOutcome> => {
        if (output) options?.onOutput?.(output);
        return outcome;
    });
}

describe('AwsCliUploader', () => {
    const options = { bucket: 'test-bucket', region: 'eu-west-1', timeoutMs: 5000 };

    it('copies the file with a bounded timeout', async () => {
        const runner = fakeRunner({ exitCode: 0, timedOut: false });
        const uploader = new AwsCliUploader(options, runner);

        await uploader.upload('/srv/dayz/backups/backup-20240601-120000.zip', 'dayz/backup-20240601-120000.zip');

        expect(runner).toHaveBeenCalledTimes(1);
        expect(runner.mock.calls[0][0]).toEqual({
            file: 'aws',
            args: [
                's3', 'cp',
                '/srv/dayz/backups/backup-20240601-120000.zip',
                's3://test-bucket/dayz/backup-20240601-120000.zip',
                '--region', 'eu-west-1',
                '--only-show-errors'
            ]
        });
        expect(runner.mock.calls[0][1]).toMatchObject({ timeoutMs: 5000 });
    });

    it('rejects on timeout', async () => {
        const uploader = new AwsCliUploader(options, fakeRunner({ exitCode: 137, timedOut: true }));

        await expect(uploader.upload('/tmp/a.zip', 'a.zip')).rejects.toMatchObject({
            errorCode: 'E_UPLOAD_FAILED',
            message: 'Upload timed out after 5s'
        });
    });

    it('rejects with the last line of CLI output on failure', async () => {
        const runner = fakeRunner({ exitCode: 1, timedOut: false }, 'warning\nAccess Denied\n');
        const uploader = new AwsCliUploader(options, runner);

        await expect(uploader.upload('/tmp/a.zip', 'a.zip')).rejects.toMatchObject({
            message: 'aws s3 cp exited with 1: Access Denied'
        });
    });

    it('bounds the copy by five seconds whatever timeout it is given', async () => {
        for (const timeoutMs of [0, 600000]) {
            const runner = fakeRunner({ exitCode: 0, timedOut: false });
            await new AwsCliUploader({ ...options, timeoutMs }, runner).upload('/tmp/a.zip', 'a.zip');

            expect(runner.mock.calls[0][1]).toMatchObject({ timeoutMs: 5000 });
        }
    });
});
