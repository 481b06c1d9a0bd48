import net from 'net';
import si from 'systeminformation';
import { Logger } from './logger';
import { errorMessage } from './AppError';

export class NetUtils {

    /**
     * Checks if something accepts TCP connections on the port.
     * @returns True if port is busy, False if free.
     */
    static async checkPort(port: number, host = '127.0.0.1', timeout = 200): Promise<boolean> {
        return new Promise((resolve) => {
            const socket = new net.Socket();
            socket.setTimeout(timeout); // Fast timeout for responsiveness
            socket.on('connect', () => {
                socket.destroy();
                resolve(true);
            });
            socket.on('error', () => {
                socket.destroy();
                resolve(false);
            });
            socket.on('timeout', () => {
                socket.destroy();
                resolve(false);
            });
            socket.connect(port, host);
        });
    }

    /**
     * Looks the port up in the socket table. Game servers usually bind UDP,
     * which a connect probe cannot see, so both TCP listeners and UDP binds count.
     * Returns null when the socket table is unavailable.
     */
    static async isPortBound(port: number, logger?: Logger): Promise<boolean | null> {
        try {
            const connections = await si.networkConnections();
            if (connections.length === 0) return null;

            return connections.some(c =>
                c.localPort === String(port) &&
                (c.state === 'LISTEN' || c.protocol.toLowerCase().startsWith('udp'))
            );
        } catch (e) {
            logger?.debug(`[NetUtils] Socket table unavailable: ${errorMessage(e)}`);
            return null;
        }
    }
}
