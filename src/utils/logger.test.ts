import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Logger } from './logger';

const LINE = /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[([A-Z]+)\] (.*)$/;

function readLines(file: string): string[] {
    return fs.readFileSync(file, 'utf8').split('\n').filter(Boolean);
}

describe('Logger', () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gamesup-log-'));
        file = path.join(dir, 'logs', 'server.log');
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('writes timestamped lines with the level tag', () => {
        const logger = new Logger({ file, quiet: true });
        logger.info('Server started');
        logger.critical('Out of restarts');
        logger.close();

        const lines = readLines(file);
        expect(lines).toHaveLength(2);
        expect(LINE.exec(lines[0])?.slice(1)).toEqual(['INFO', 'Server started']);
        expect(LINE.exec(lines[1])?.slice(1)).toEqual(['CRITICAL', 'Out of restarts']);
    });

    it('drops debug lines unless verbose', () => {
        const quiet = new Logger({ file, quiet: true });
        quiet.debug('hidden');
        quiet.info('shown');
        quiet.close();

        expect(readLines(file).map(l => LINE.exec(l)?.[2])).toEqual(['shown']);
    });

    it('collapses repeated messages into a summary', () => {
        const logger = new Logger({ file, quiet: true });
        logger.warn('Port not listening');
        logger.warn('Port not listening');
        logger.warn('Port not listening');
        logger.info('Port back');
        logger.close();

        expect(readLines(file).map(l => LINE.exec(l)?.[2])).toEqual([
            'Port not listening',
            '(Previous message repeated 2 times)',
            'Port back'
        ]);
    });

    it('writes raw output verbatim', () => {
        const logger = new Logger({ file, quiet: true });
        logger.raw('SteamCMD: Success! App fully installed.');
        logger.close();

        expect(readLines(file)).toEqual(['SteamCMD: Success! App fully installed.']);
    });

    it('rotates the file to .old once it exceeds the size cap', () => {
        const logger = new Logger({ file, quiet: true, maxSize: 10 });
        logger.raw('first line of output');
        logger.raw('second line');
        logger.close();

        expect(readLines(`${file}.old`)).toEqual(['first line of output']);
        expect(readLines(file)).toEqual(['second line']);
    });
});
