import path from 'path';
import { CommandSpec } from '../../../shared/types';
import { UpdateSettings } from '../../config';
import { Logger } from '../../utils/logger';
import { RetryExecutor, RetryResult } from '../processes/RetryExecutor';

/**
 * Pulls the latest server build through SteamCMD before the first start.
 * Failure is not fatal: the server starts with the files already installed.
 */
export class ServerUpdater {
    constructor(
        private readonly settings: UpdateSettings,
        private readonly serverDir: string,
        private readonly executor: RetryExecutor,
        private readonly logger: Logger
    ) {}

    buildCommand(): CommandSpec {
        const s = this.settings;
        const args = ['+force_install_dir', this.serverDir, '+login', s.user];
        if (s.password) args.push(s.password);

        args.push('+app_update', s.appId);
        if (s.betaId) args.push('-beta', s.betaId);
        if (s.betaPassword) args.push('-betapassword', s.betaPassword);
        args.push(...s.installFlags, '+quit');

        return { file: path.join(s.steamcmdDir, 'steamcmd.sh'), args, cwd: s.steamcmdDir };
    }

    async update(signal?: AbortSignal): Promise<RetryResult | null> {
        if (!this.settings.enabled) return null;

        this.logger.info('[ServerUpdater] Checking for server updates...');
        const command = this.buildCommand();
        this.logger.debug(`[ServerUpdater] ${this.redact([command.file, ...command.args]).join(' ')}`);

        const result = await this.executor.execute(command, {
            maxAttempts: this.settings.attempts,
            initialDelayMs: this.settings.initialDelayMs,
            label: 'SteamCMD',
            signal
        });

        if (result.ok) {
            this.logger.success('[ServerUpdater] Server files are up to date');
        } else {
            this.logger.warn(`[ServerUpdater] Update failed (exit ${result.lastExitCode}), starting with installed files`);
        }
        return result;
    }

    private redact(tokens: string[]): string[] {
        const secrets = [this.settings.password, this.settings.betaPassword].filter(Boolean);
        return tokens.map(token => (secrets.includes(token) ? '***MASKED***' : token));
    }
}
