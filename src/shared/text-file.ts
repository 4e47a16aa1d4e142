/**
 * Text file helpers shared by the transcript writer and the link inserter.
 *
 * Reads decode strictly (an invalid byte sequence is an error, not U+FFFD) and
 * writes go through a temporary file in the destination folder followed by a
 * rename, so an interrupted run never leaves a truncated file behind.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { hasErrorCode } from './errors';

/** Character encodings a vault can be written in (not hex or base64) */
export const TEXT_ENCODINGS = ['utf8', 'utf-8', 'utf16le', 'utf-16le', 'ucs2', 'ucs-2', 'latin1', 'binary', 'ascii'] as const;
export type TextEncoding = typeof TEXT_ENCODINGS[number];

export function isTextEncoding(value: string): value is TextEncoding {
    return TEXT_ENCODINGS.some((candidate) => candidate === value);
}

function isUtf8(encoding: TextEncoding): boolean {
    return encoding === 'utf8' || encoding === 'utf-8';
}

/**
 * Decode bytes with the vault encoding.
 * Throws on malformed UTF-8; other encodings map every byte sequence.
 */
export function decodeText(bytes: Buffer, encoding: TextEncoding): string {
    if (isUtf8(encoding)) {
        return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
    }
    return bytes.toString(encoding);
}

export async function readTextFile(filePath: string, encoding: TextEncoding): Promise<string> {
    const bytes = await fs.readFile(filePath);
    return decodeText(bytes, encoding);
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

function tempPathFor(filePath: string): string {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    return path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * Write a file atomically: temp file beside the destination, then rename.
 * An existing file keeps its permission bits.
 */
export async function writeFileAtomic(filePath: string, content: string, encoding: TextEncoding): Promise<void> {
    const tempPath = tempPathFor(filePath);

    let mode: number | undefined;
    try {
        mode = (await fs.stat(filePath)).mode & 0o7777;
    } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error;
    }

    try {
        await fs.writeFile(tempPath, content, { encoding, mode });
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}
