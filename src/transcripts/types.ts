/**
 * Transcript types
 */

export interface TranscriptSegment {
    /** Start time in seconds */
    start: number;

    /** End time in seconds */
    end: number;

    text: string;
}

/**
 * What a transcription provider hands back for one media file
 */
export interface TranscriptionResult {
    text: string;
    segments: TranscriptSegment[];
}

export interface TranscriptionRequest {
    /** Absolute path of the media file */
    path: string;
    model: string;
    /** 'auto' or an ISO code */
    language: string;
}

export interface Transcript {
    /** Basename of the media file this transcript belongs to */
    mediaBasename: string;

    /** <transcripts folder>/<basename>_transcript.md */
    path: string;

    /** Rendered file content */
    body: string;

    /** Ordered timestamp segments (empty for transcripts read back from disk) */
    segments: TranscriptSegment[];

    /** true when the file was already there and left untouched */
    existed: boolean;

    /** Where auto-move put the media file, if it moved */
    movedTo?: string;
}
