/**
 * Media discovery
 *
 * Finds audio/video files in the vault that still need a transcript.
 */

import * as path from 'path';
import {
    Configuration,
    getAudioFolder,
    getSupportedExtensions,
    getTranscriptPath,
    getTranscriptsFolder,
} from '../config/config';
import { Logger } from '../shared/logger';
import { fileExists } from '../shared/text-file';
import { comparePaths, listFiles } from '../shared/vault-walk';

export interface MediaFile {
    /** Absolute path */
    path: string;
    /** Filename without extension */
    basename: string;
    /** Lowercase, with the leading dot */
    extension: string;
    discoveredAt: Date;
}

export function toMediaFile(filePath: string, discoveredAt: Date = new Date()): MediaFile {
    const extension = path.extname(filePath);
    return {
        path: filePath,
        basename: path.basename(filePath, extension),
        extension: extension.toLowerCase(),
        discoveredAt,
    };
}

/**
 * Find all media files that need transcription, sorted by path.
 *
 * Recursive search walks the whole vault (except the transcripts folder);
 * otherwise only the vault root and the audio folder are scanned.
 */
export async function findMediaFiles(config: Configuration, logger?: Logger): Promise<MediaFile[]> {
    const supported = new Set(getSupportedExtensions(config));
    const isMedia = (filePath: string) => supported.has(path.extname(filePath).toLowerCase());
    const transcriptsFolder = getTranscriptsFolder(config);

    let candidates: string[];
    if (config.recursiveSearch) {
        candidates = await listFiles(config.vaultPath, {
            recursive: true,
            excludeDirs: [transcriptsFolder],
            filter: isMedia,
        });
    } else {
        const topLevel = await listFiles(config.vaultPath, { recursive: false, filter: isMedia });
        const audioFolder = await listFiles(getAudioFolder(config), { recursive: false, filter: isMedia });
        candidates = [...new Set([...topLevel, ...audioFolder])].sort(comparePaths);
    }

    const discoveredAt = new Date();
    const mediaFiles: MediaFile[] = [];

    for (const filePath of candidates) {
        const media = toMediaFile(filePath, discoveredAt);

        if (config.skipExistingTranscripts && await fileExists(getTranscriptPath(config, media.basename))) {
            logger?.debug(`⏭️ Skipping ${path.basename(filePath)} - transcript already exists`);
            continue;
        }
        mediaFiles.push(media);
    }

    return mediaFiles;
}
