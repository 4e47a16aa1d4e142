/**
 * Owner and group for files the run creates or moves
 *
 * owner_user / owner_group take a numeric id or a name looked up in the
 * system account files. An unset side is passed to chown as -1 (unchanged).
 */

import * as fs from 'fs/promises';
import { ConfigurationError, describeError } from './errors';
import { Logger } from './logger';

export interface FileOwner {
    uid: number;
    gid: number;
}

export type OwnerSetting = string | number | null;

export type ChownFn = (filePath: string, uid: number, gid: number) => Promise<void>;

export interface AccountFiles {
    passwd: string;
    group: string;
}

const SYSTEM_ACCOUNT_FILES: AccountFiles = {
    passwd: '/etc/passwd',
    group: '/etc/group',
};

const NUMERIC_ID = /^\d+$/;

/**
 * Find the id of a name in a passwd/group style file (name:x:id:...)
 */
async function lookupId(accountFile: string, name: string): Promise<number | null> {
    let text: string;
    try {
        text = await fs.readFile(accountFile, 'utf-8');
    } catch {
        return null;
    }

    for (const line of text.split('\n')) {
        if (line.startsWith('#')) continue;
        const fields = line.split(':');
        if (fields.length >= 3 && fields[0] === name && NUMERIC_ID.test(fields[2])) {
            return Number(fields[2]);
        }
    }
    return null;
}

async function resolveId(field: string, setting: OwnerSetting, accountFile: string): Promise<number> {
    if (setting === null) return -1;
    if (typeof setting === 'number') return setting;
    if (NUMERIC_ID.test(setting)) return Number(setting);

    const id = await lookupId(accountFile, setting);
    if (id === null) {
        throw new ConfigurationError(field, `Unknown ${field === 'owner_user' ? 'user' : 'group'} "${setting}"`);
    }
    return id;
}

/**
 * Resolve the configured owner. Returns null when neither side is set.
 */
export async function resolveFileOwner(
    user: OwnerSetting,
    group: OwnerSetting,
    files: AccountFiles = SYSTEM_ACCOUNT_FILES
): Promise<FileOwner | null> {
    if (user === null && group === null) return null;
    return {
        uid: await resolveId('owner_user', user, files.passwd),
        gid: await resolveId('owner_group', group, files.group),
    };
}

export class OwnershipFixer {
    constructor(
        private readonly owner: FileOwner | null,
        private readonly logger?: Logger,
        private readonly chown: ChownFn = fs.chown
    ) {}

    /**
     * Hand a path to the configured owner. A failure is logged, never thrown.
     */
    async apply(filePath: string): Promise<void> {
        if (!this.owner) return;
        try {
            await this.chown(filePath, this.owner.uid, this.owner.gid);
        } catch (error) {
            this.logger?.warn(`⚠️ Could not set owner of ${filePath}: ${describeError(error)}`);
        }
    }
}
