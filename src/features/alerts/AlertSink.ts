import axios from 'axios';
import crypto from 'crypto';
import { AlertSeverity } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { errorMessage } from '../../utils/AppError';
import { boundTimeout, MAX_OUTBOUND_TIMEOUT_MS } from '../../config';

export interface AlertSinkOptions {
    webhookUrl?: string;
    webhookSecret?: string;
    prefix?: string;
    timeoutMs?: number;
}

/**
 * Fire-and-forget alerting. The alert text is always written to the local log
 * before delivery is attempted; a dropped alert is never redelivered.
 */
export class AlertSink {
    private readonly webhookUrl: string;
    private readonly webhookSecret: string;
    private readonly prefix: string;
    private readonly timeoutMs: number;

    constructor(private readonly logger: Logger, options: AlertSinkOptions = {}) {
        this.webhookUrl = options.webhookUrl ?? '';
        this.webhookSecret = options.webhookSecret ?? '';
        this.prefix = options.prefix ?? 'Game Server Alert';
        this.timeoutMs = boundTimeout(options.timeoutMs ?? MAX_OUTBOUND_TIMEOUT_MS);
    }

    async notify(message: string, severity: AlertSeverity = 'warning'): Promise<void> {
        if (severity === 'critical') {
            this.logger.critical(message);
        } else {
            this.logger.alert(message);
        }

        if (!this.webhookUrl) return;

        const payload = { text: `${this.prefix}: ${message}` };
        try {
            const headers: Record<string, string> = {
                'Content-Type': 'application/json',
                'User-Agent': 'GameServerSupervisor-Alert/1.0'
            };

            if (this.webhookSecret) {
                const signature = crypto.createHmac('sha256', this.webhookSecret)
                    .update(JSON.stringify(payload))
                    .digest('hex');
                headers['X-Alert-Signature'] = `sha256=${signature}`;
            }

            await axios.post(this.webhookUrl, payload, { headers, timeout: this.timeoutMs });
        } catch (e) {
            this.logger.warn(`[AlertSink] Alert delivery failed: ${errorMessage(e)}`);
        }
    }
}
