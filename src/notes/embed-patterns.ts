/**
 * Embed patterns
 *
 * One place that defines what "this note embeds media file X" looks like in
 * each markdown dialect. The note matcher scans with these patterns and the
 * link inserter uses buildTranscriptLinkPattern to recognise a link it (or
 * the user) already added.
 *
 *   wikilink-embed   ![[lecture1.mp3]]   ![[Audio/lecture1.mp3|alias]]
 *   standard-embed   ![lecture1](lecture1.mp3)   ![x](<Audio/my talk.mp3> "title")
 */

import { Configuration, getSupportedExtensions, getTranscriptName } from '../config/config';

export const EMBED_VARIANTS = ['wikilink-embed', 'standard-embed'] as const;
export type EmbedVariant = typeof EMBED_VARIANTS[number];

export interface EmbedPattern {
    variant: EmbedVariant;
    /** true when the reference carries a folder path before the filename */
    qualified: boolean;
    /** Lowercase extension with the leading dot */
    extension: string;
    /** Global, case-insensitive */
    regex: RegExp;
}

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Spellings of a filename inside a markdown link destination:
 * as written and percent-encoded ("my talk" -> "my%20talk", "a#b" -> "a%23b")
 */
function destinationNames(basename: string): string {
    const spellings = new Set([basename, encodeURI(basename), encodeURIComponent(basename)]);
    return `(?:${[...spellings].map(escapeRegExp).join('|')})`;
}

// Wikilink target suffix: |alias or #fragment up to the closing brackets
const WIKILINK_SUFFIX = '(?:[|#][^\\]\\n]*)?';
// Anything but link-breaking characters, ending in a path separator
const WIKILINK_FOLDER = '[^\\[\\]|#\\n]*/';
const STANDARD_FOLDER = '[^()<>\\n]*/';
// Optional link title: "title" or 'title'
const STANDARD_TITLE = '(?:\\s+(?:"[^"\\n]*"|\'[^\'\\n]*\'))?';

function wikilinkSource(basename: string, extension: string, qualified: boolean): string {
    const folder = qualified ? WIKILINK_FOLDER : '';
    return `!\\[\\[${folder}${escapeRegExp(basename)}${escapeRegExp(extension)}${WIKILINK_SUFFIX}\\]\\]`;
}

function standardSource(basename: string, extension: string, qualified: boolean): string {
    const folder = qualified ? STANDARD_FOLDER : '';
    return `!\\[[^\\]\\n]*\\]\\(\\s*<?${folder}${destinationNames(basename)}${escapeRegExp(extension)}>?${STANDARD_TITLE}\\s*\\)`;
}

/**
 * Build every embed pattern for a media basename:
 * {wikilink, standard} x {folder-qualified, bare} x {each configured extension}.
 *
 * The basename is always anchored between the syntax (or a '/') and the
 * extension, so "lecture1" never matches "lecture10.mp3" or "my-lecture1.mp3".
 */
export function buildPatterns(basename: string, config: Configuration): EmbedPattern[] {
    const patterns: EmbedPattern[] = [];

    for (const extension of getSupportedExtensions(config)) {
        for (const variant of EMBED_VARIANTS) {
            for (const qualified of [false, true]) {
                const source = variant === 'wikilink-embed'
                    ? wikilinkSource(basename, extension, qualified)
                    : standardSource(basename, extension, qualified);

                patterns.push({ variant, qualified, extension, regex: new RegExp(source, 'gi') });
            }
        }
    }

    return patterns;
}

/**
 * Recognise an existing link to the transcript of basename, in any style:
 * [[lecture1_transcript]], [[Audio-Transcripts/lecture1_transcript|x]],
 * [label](../transcripts/lecture1_transcript.md)
 */
export function buildTranscriptLinkPattern(basename: string): RegExp {
    const name = getTranscriptName(basename);
    const wikilink = `\\[\\[(?:${WIKILINK_FOLDER})?${escapeRegExp(name)}(?:\\.md)?${WIKILINK_SUFFIX}\\]\\]`;
    const standard = `\\]\\(\\s*<?(?:${STANDARD_FOLDER})?${destinationNames(name)}\\.md>?${STANDARD_TITLE}\\s*\\)`;
    return new RegExp(`${wikilink}|${standard}`, 'i');
}
