/**
 * Note matching
 *
 * Scans the vault's markdown notes for embeds of a media file.
 */

import * as path from 'path';
import { Configuration, getTranscriptsFolder } from '../config/config';
import { NoteIOError, describeError } from '../shared/errors';
import { Logger } from '../shared/logger';
import { readTextFile } from '../shared/text-file';
import { comparePaths, listFiles } from '../shared/vault-walk';
import { EmbedPattern, EmbedVariant, buildPatterns } from './embed-patterns';

export interface NoteMatch {
    notePath: string;
    /** Character offset of the embed in the decoded note text */
    offset: number;
    length: number;
    matchedText: string;
    variant: EmbedVariant;
    qualified: boolean;
}

const NOTE_EXTENSION = '.md';

/**
 * Find every embed occurrence in one note's text, ordered by offset
 */
export function scanNote(notePath: string, content: string, patterns: EmbedPattern[]): NoteMatch[] {
    const matches: NoteMatch[] = [];

    for (const pattern of patterns) {
        for (const match of content.matchAll(pattern.regex)) {
            matches.push({
                notePath,
                offset: match.index ?? 0,
                length: match[0].length,
                matchedText: match[0],
                variant: pattern.variant,
                qualified: pattern.qualified,
            });
        }
    }

    return matches.sort((a, b) => a.offset - b.offset);
}

export class NoteMatcher {
    constructor(
        private readonly config: Configuration,
        private readonly logger?: Logger
    ) {}

    /**
     * All markdown notes in the vault, transcripts excluded
     */
    async listNotes(): Promise<string[]> {
        return listFiles(this.config.vaultPath, {
            recursive: true,
            excludeDirs: [getTranscriptsFolder(this.config)],
            filter: (filePath) => path.extname(filePath).toLowerCase() === NOTE_EXTENSION,
        });
    }

    /**
     * Find all notes that embed the media file with this basename.
     * Unreadable notes are logged and skipped.
     */
    async findNotesWithAudio(basename: string): Promise<NoteMatch[]> {
        const patterns = buildPatterns(basename, this.config);
        const notes = await this.listNotes();
        const matches: NoteMatch[] = [];

        for (const notePath of notes) {
            let content: string;
            try {
                content = await readTextFile(notePath, this.config.encoding);
            } catch (error) {
                const noteError = new NoteIOError(notePath, `unreadable as ${this.config.encoding}: ${describeError(error)}`, { cause: error });
                this.logger?.warn(`⚠️ Skipping note ${noteError.message}`);
                continue;
            }

            matches.push(...scanNote(notePath, content, patterns));
        }

        return matches.sort((a, b) => comparePaths(a.notePath, b.notePath) || a.offset - b.offset);
    }
}
