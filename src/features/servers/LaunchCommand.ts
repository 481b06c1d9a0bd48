import fs from 'fs-extra';
import path from 'path';
import { CommandSpec } from '../../../shared/types';
import { ServerSettings } from '../../config';

/**
 * `-mod=` value: CLIENT_MODS verbatim, otherwise `@<id>` for every MOD_IDS
 * entry that is installed in the server directory.
 */
export async function resolveModList(server: ServerSettings): Promise<string> {
    if (server.clientMods) return server.clientMods;

    const installed: string[] = [];
    for (const id of server.modIds) {
        if (await fs.pathExists(path.join(server.dir, `@${id}`))) {
            installed.push(`@${id}`);
        }
    }
    return installed.join(';');
}

export async function buildLaunchCommand(server: ServerSettings): Promise<CommandSpec> {
    const args = [
        `-port=${server.port}`,
        `-profiles=${server.profilesDir}`,
        '-bepath=./',
        `-config=${server.configFile}`
    ];

    const mods = await resolveModList(server);
    if (mods) args.push(`-mod=${mods}`);
    if (server.serverMods) args.push(`-serverMod=${server.serverMods}`);

    args.push(...server.startupParams);

    return {
        file: path.resolve(server.dir, server.binary),
        args,
        cwd: server.dir
    };
}

export function describeCommand(command: CommandSpec): string {
    return [command.file, ...command.args].join(' ');
}
