/**
 * Link insertion
 *
 * Adds the transcript link on the line right after a matched embed:
 *
 *   ![[lecture1.mp3]]
 *   📝 **Transcript:** [[lecture1_transcript]]
 *
 * A link already present on the embed line or in the lines right below it
 * (in any style, blank lines skipped) means the note is left alone, so
 * repeated runs are no-ops.
 */

import * as path from 'path';
import { Configuration } from '../config/config';
import { NoteIOError, describeError } from '../shared/errors';
import { Logger } from '../shared/logger';
import { readTextFile, writeFileAtomic } from '../shared/text-file';
import { renderLink } from '../transcripts/template';
import { Transcript } from '../transcripts/types';
import { buildTranscriptLinkPattern } from './embed-patterns';
import { NoteMatch } from './note-matcher';

export interface LinkInserterOptions {
    config: Configuration;
    /** Link template text (used by the custom link style) */
    linkTemplate: string;
    logger?: Logger;
}

export interface LinkInsertion {
    content: string;
    inserted: boolean;
}

function lineEndAt(content: string, from: number): number {
    const index = content.indexOf('\n', from);
    return index === -1 ? content.length : index;
}

/**
 * Text of the first `count` lines after lineEnd, starting at the first line
 * with any non-whitespace content
 */
function followingLines(content: string, lineEnd: number, count: number): string {
    let start = lineEnd + 1;
    while (start < content.length) {
        const end = lineEndAt(content, start);
        if (content.slice(start, end).trim().length > 0) {
            return content.slice(start).split('\n').slice(0, count).join('\n');
        }
        start = end + 1;
    }
    return '';
}

/**
 * Pure part of insertLink: compute the new note text
 */
export function insertLinkIntoText(content: string, match: NoteMatch, linkText: string, existingLink: RegExp): LinkInsertion {
    if (content.slice(match.offset, match.offset + match.length) !== match.matchedText) {
        throw new NoteIOError(match.notePath, `embed "${match.matchedText}" is no longer at offset ${match.offset}`);
    }

    const eol = content.includes('\r\n') ? '\r\n' : '\n';
    // A custom link template may span several lines
    const link = linkText.replace(/\r?\n/g, eol);
    const linkLineCount = link.split('\n').length;

    const embedEnd = match.offset + match.length;
    const lineEnd = lineEndAt(content, embedEnd);
    const hasLink = (text: string) => text.includes(link) || existingLink.test(text);

    if (hasLink(content.slice(embedEnd, lineEnd)) || hasLink(followingLines(content, lineEnd, linkLineCount))) {
        return { content, inserted: false };
    }

    if (lineEnd === content.length) {
        return { content: `${content}${eol}${link}`, inserted: true };
    }

    const head = content.slice(0, lineEnd + 1);
    const tail = content.slice(lineEnd + 1);
    return { content: `${head}${link}${eol}${tail}`, inserted: true };
}

export class LinkInserter {
    private readonly config: Configuration;
    private readonly linkTemplate: string;
    private readonly logger?: Logger;

    constructor(options: LinkInserterOptions) {
        this.config = options.config;
        this.linkTemplate = options.linkTemplate;
        this.logger = options.logger;
    }

    /**
     * Insert the transcript link below one embed.
     * Returns true if the note was rewritten.
     */
    async insertLink(match: NoteMatch, transcript: Transcript): Promise<boolean> {
        let content: string;
        try {
            content = await readTextFile(match.notePath, this.config.encoding);
        } catch (error) {
            throw new NoteIOError(match.notePath, `could not read note: ${describeError(error)}`, { cause: error });
        }

        const linkText = renderLink(transcript.mediaBasename, match.notePath, this.config, this.linkTemplate);
        const result = insertLinkIntoText(content, match, linkText, buildTranscriptLinkPattern(transcript.mediaBasename));

        if (!result.inserted) {
            this.logger?.debug(`Transcript link already present in ${path.basename(match.notePath)}`);
            return false;
        }

        try {
            await writeFileAtomic(match.notePath, result.content, this.config.encoding);
        } catch (error) {
            throw new NoteIOError(match.notePath, `could not write note: ${describeError(error)}`, { cause: error });
        }

        this.logger?.info(`✅ Added transcript link to ${path.basename(match.notePath)}`);
        return true;
    }
}

/**
 * Matches grouped per note, last offset first, so each insertion leaves the
 * offsets of the remaining matches in that note unchanged
 */
export function orderForInsertion(matches: readonly NoteMatch[]): NoteMatch[][] {
    const byNote = new Map<string, NoteMatch[]>();
    for (const match of matches) {
        const list = byNote.get(match.notePath) ?? [];
        list.push(match);
        byNote.set(match.notePath, list);
    }
    return [...byNote.values()].map((list) => [...list].sort((a, b) => b.offset - a.offset));
}
