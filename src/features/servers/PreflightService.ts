import fs from 'fs-extra';
import path from 'path';
import { ServerSettings } from '../../config';
import { Logger } from '../../utils/logger';
import { PreflightError, errorMessage } from '../../utils/AppError';
import { SystemInspector } from '../health/SystemInspector';

export interface PreflightOptions {
    diskUsageThreshold?: number;
}

/**
 * Validation run in STARTING. Any thrown PreflightError counts as a crash.
 */
export class PreflightService {
    constructor(
        private readonly server: ServerSettings,
        private readonly logger: Logger,
        private readonly inspector?: SystemInspector,
        private readonly options: PreflightOptions = {}
    ) {}

    get binaryPath(): string {
        return path.resolve(this.server.dir, this.server.binary);
    }

    async run(): Promise<void> {
        this.logger.info('[Preflight] Running pre-flight checks...');

        // 1. Server binary exists
        const binaryPath = this.binaryPath;
        if (!(await fs.pathExists(binaryPath))) {
            throw new PreflightError('E_BINARY_MISSING', `Server binary not found: ${this.server.binary}`, { path: binaryPath });
        }

        // 2. Configuration file exists
        const configPath = path.resolve(this.server.dir, this.server.configFile);
        if (!(await fs.pathExists(configPath))) {
            throw new PreflightError('E_CONFIG_MISSING', `Configuration file not found: ${this.server.configFile}`, { path: configPath });
        }

        // 3. Binary is executable (fixed in place when possible)
        try {
            await fs.access(binaryPath, fs.constants.X_OK);
        } catch {
            this.logger.warn('[Preflight] Server binary is not executable, fixing...');
            try {
                await fs.chmod(binaryPath, 0o755);
            } catch (e) {
                throw new PreflightError(
                    'E_BINARY_NOT_EXECUTABLE',
                    `Failed to make server binary executable: ${errorMessage(e)}`,
                    { path: binaryPath }
                );
            }
        }

        // 4. Disk space (warning only)
        if (this.inspector) {
            const threshold = this.options.diskUsageThreshold ?? 90;
            try {
                const usage = await this.inspector.diskUsagePercent(this.server.dir);
                if (usage !== null && usage > threshold) {
                    this.logger.warn(`[Preflight] Disk usage critical: ${usage}%`);
                }
            } catch (e) {
                this.logger.debug(`[Preflight] Disk usage unavailable: ${errorMessage(e)}`);
            }
        }

        this.logger.success('[Preflight] Pre-flight checks passed');
    }
}
