import { boundTimeout } from '../../config';
import { AppError } from '../../utils/AppError';
import { CommandRunner, runCommand } from '../processes/CommandRunner';

export interface ObjectStorageUploader {
    /** Human-readable destination, for logs */
    describe(key: string): string;
    /** Rejects when the object was not stored. */
    upload(localPath: string, key: string): Promise<void>;
}

export interface S3UploaderOptions {
    bucket: string;
    region: string;
    timeoutMs: number;
}

/**
 * Uploads through the AWS CLI (`aws s3 cp`), bounded by a timeout.
 */
export class AwsCliUploader implements ObjectStorageUploader {
    private readonly timeoutMs: number;

    constructor(private readonly options: S3UploaderOptions, private readonly runner: CommandRunner = runCommand) {
        this.timeoutMs = boundTimeout(options.timeoutMs);
    }

    describe(key: string): string {
        return `s3://${this.options.bucket}/${key}`;
    }

    async upload(localPath: string, key: string): Promise<void> {
        let output = '';
        const outcome = await this.runner(
            {
                file: 'aws',
                args: ['s3', 'cp', localPath, this.describe(key), '--region', this.options.region, '--only-show-errors']
            },
            {
                timeoutMs: this.timeoutMs,
                onOutput: (chunk) => { output += chunk; }
            }
        );

        if (outcome.timedOut) {
            throw new AppError('E_UPLOAD_FAILED', `Upload timed out after ${this.timeoutMs / 1000}s`);
        }
        if (outcome.exitCode !== 0) {
            const detail = output.trim().split('\n').pop() ?? '';
            throw new AppError('E_UPLOAD_FAILED', `aws s3 cp exited with ${outcome.exitCode}${detail ? `: ${detail}` : ''}`);
        }
    }
}
