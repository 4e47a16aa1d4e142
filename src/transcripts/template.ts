/**
 * Template rendering for transcript files and transcript links
 *
 * Placeholders are {name}. Unknown placeholders are left as written, and so
 * is anything in double braces ({{date}} belongs to other template plugins).
 */

import * as path from 'path';
import { Configuration, getTranscriptName, getTranscriptPath } from '../config/config';
import { TemplateError } from '../shared/errors';
import { MediaFile } from '../media/discover';
import { TranscriptSegment, TranscriptionResult } from './types';

export type TemplateBindings = Readonly<Record<string, string | undefined>>;

const PLACEHOLDER = /(?<!\{)\{([A-Za-z_][A-Za-z0-9_]*)\}(?!\})/g;

export const DEFAULT_SEGMENT_TEMPLATE = '**[{timestamp}]** {text}';

export const TRANSCRIPT_REQUIRED_BINDINGS = ['transcript_content'] as const;
export const LINK_REQUIRED_BINDINGS = ['audio_name'] as const;

function hasBinding(bindings: TemplateBindings, name: string): boolean {
    return Object.hasOwn(bindings, name) && bindings[name] !== undefined;
}

/**
 * Substitute {name} placeholders.
 * Throws TemplateError if a required binding is missing.
 */
export function render(template: string, bindings: TemplateBindings, required: readonly string[] = []): string {
    for (const name of required) {
        if (!hasBinding(bindings, name)) {
            throw new TemplateError(name);
        }
    }

    return template.replace(PLACEHOLDER, (placeholder: string, name: string) => {
        const value = hasBinding(bindings, name) ? bindings[name] : undefined;
        return value ?? placeholder;
    });
}

/**
 * 75.4 -> "1:15", 3725 -> "1:02:05"
 */
export function formatTimestamp(seconds: number): string {
    const total = Math.max(0, Math.floor(seconds));
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    const secs = total % 60;

    const ss = secs.toString().padStart(2, '0');
    if (hours > 0) {
        return `${hours}:${minutes.toString().padStart(2, '0')}:${ss}`;
    }
    return `${minutes}:${ss}`;
}

/**
 * One line per segment
 */
export function renderSegments(segments: readonly TranscriptSegment[], lineTemplate: string = DEFAULT_SEGMENT_TEMPLATE): string {
    return segments
        .map((segment) => render(lineTemplate, {
            timestamp: formatTimestamp(segment.start),
            start: formatTimestamp(segment.start),
            end: formatTimestamp(segment.end),
            text: segment.text.trim(),
        }))
        .join('\n');
}

/**
 * Local time as YYYY-MM-DD HH:mm:ss
 */
export function formatDate(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Transcript body: one line per segment, or the plain text when the
 * provider returned no segments
 */
export function transcriptBody(result: TranscriptionResult): string {
    if (result.segments.length === 0) {
        return result.text.trim();
    }
    return result.segments.map((segment) => segment.text.trim()).join('\n');
}

function toPosix(filePath: string): string {
    return filePath.split(path.sep).join('/');
}

export function buildTranscriptBindings(
    media: MediaFile,
    result: TranscriptionResult,
    config: Configuration,
    now: Date
): TemplateBindings {
    return {
        filename: path.basename(media.path),
        date: formatDate(now),
        audio_folder: config.audioFolderName,
        original_location: toPosix(path.relative(config.vaultPath, media.path)),
        transcript_content: transcriptBody(result),
        timestamp_content: config.createTimestamps ? renderSegments(result.segments) : '',
    };
}

export function renderTranscript(template: string, bindings: TemplateBindings): string {
    return render(template, bindings, TRANSCRIPT_REQUIRED_BINDINGS);
}

/**
 * Path from a note to the transcript file, as a markdown link destination
 */
export function transcriptLinkTarget(basename: string, notePath: string, config: Configuration): string {
    const relative = path.relative(path.dirname(notePath), getTranscriptPath(config, basename));
    return toPosix(relative).split('/').map(encodeURIComponent).join('/');
}

/**
 * The line inserted under an embed, per the configured link style
 */
export function renderLink(basename: string, notePath: string, config: Configuration, linkTemplate: string): string {
    const name = getTranscriptName(basename);
    const withPrefix = (link: string) => [config.linkFormatPrefix.trim(), link].filter(Boolean).join(' ');

    switch (config.linkFormatStyle) {
        case 'wikilink':
            return withPrefix(`[[${name}]]`);
        case 'standard':
            return withPrefix(`[${name}](${transcriptLinkTarget(basename, notePath, config)})`);
        case 'custom':
            return render(linkTemplate.replace(/(\r?\n)+$/, ''), {
                audio_name: basename,
                transcript_name: name,
                transcript_path: transcriptLinkTarget(basename, notePath, config),
                prefix: config.linkFormatPrefix,
            }, LINK_REQUIRED_BINDINGS);
    }
}
