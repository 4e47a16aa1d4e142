/**
 * Transcript writer
 *
 * Transcribes one media file, renders the transcript template and writes
 * <transcripts folder>/<basename>_transcript.md atomically. With auto-move,
 * the media file is relocated into the audio folder only after the write.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
    Configuration,
    getAudioFolder,
    getTranscriptPath,
    getTranscriptsFolder,
} from '../config/config';
import { TranscriptionError, describeError, hasErrorCode } from '../shared/errors';
import { Logger } from '../shared/logger';
import { OwnershipFixer } from '../shared/ownership';
import { fileExists, readTextFile, writeFileAtomic } from '../shared/text-file';
import { MediaFile } from '../media/discover';
import { TranscriptionProvider } from './provider';
import { buildTranscriptBindings, renderTranscript } from './template';
import { Transcript, TranscriptionResult } from './types';

export interface TranscriptWriterOptions {
    config: Configuration;
    provider: TranscriptionProvider;
    /** Transcript template text */
    template: string;
    logger?: Logger;
    now?: () => Date;
    /** Applied to the written transcript and the moved media file */
    ownership?: OwnershipFixer;
}

async function moveFile(source: string, destination: string): Promise<void> {
    try {
        await fs.rename(source, destination);
    } catch (error) {
        if (!hasErrorCode(error, 'EXDEV')) throw error;
        // Different file systems: copy, then remove the original
        await fs.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
        await fs.unlink(source);
    }
}

export class TranscriptWriter {
    private readonly config: Configuration;
    private readonly provider: TranscriptionProvider;
    private readonly template: string;
    private readonly logger?: Logger;
    private readonly now: () => Date;
    private readonly ownership?: OwnershipFixer;

    constructor(options: TranscriptWriterOptions) {
        this.config = options.config;
        this.provider = options.provider;
        this.template = options.template;
        this.logger = options.logger;
        this.now = options.now ?? (() => new Date());
        this.ownership = options.ownership;
    }

    /**
     * Produce the transcript for a media file.
     * Throws TranscriptionError (provider or write failure) or TemplateError.
     */
    async writeTranscript(media: MediaFile): Promise<Transcript> {
        const destination = getTranscriptPath(this.config, media.basename);

        if (this.config.skipExistingTranscripts && await fileExists(destination)) {
            this.logger?.info(`⏭️ Transcript already exists: ${path.basename(destination)}`);
            return {
                mediaBasename: media.basename,
                path: destination,
                body: await readTextFile(destination, this.config.encoding),
                segments: [],
                existed: true,
            };
        }

        this.logger?.info(`🎧 Transcribing: ${path.basename(media.path)}`);

        let result: TranscriptionResult;
        try {
            result = await this.provider.transcribe({
                path: media.path,
                model: this.config.whisperModel,
                language: this.config.language,
            });
        } catch (error) {
            throw new TranscriptionError(media.path, 'transcribe', `${this.provider.name} failed: ${describeError(error)}`, { cause: error });
        }

        const body = renderTranscript(this.template, buildTranscriptBindings(media, result, this.config, this.now()));

        try {
            await fs.mkdir(getTranscriptsFolder(this.config), { recursive: true });
            await writeFileAtomic(destination, body, this.config.encoding);
        } catch (error) {
            throw new TranscriptionError(media.path, 'write', `could not write ${destination}: ${describeError(error)}`, { cause: error });
        }
        await this.ownership?.apply(destination);
        this.logger?.info(`✅ Transcript saved: ${path.basename(destination)} (${result.text.length} chars)`);

        const transcript: Transcript = {
            mediaBasename: media.basename,
            path: destination,
            body,
            segments: result.segments,
            existed: false,
        };

        if (this.config.autoMoveFiles) {
            transcript.movedTo = await this.moveToAudioFolder(media);
        }
        return transcript;
    }

    /**
     * Move the media file into the audio folder.
     * Returns the new path, or undefined when the file stays where it is.
     */
    private async moveToAudioFolder(media: MediaFile): Promise<string | undefined> {
        const audioFolder = getAudioFolder(this.config);
        const filename = path.basename(media.path);

        if (path.resolve(path.dirname(media.path)) === path.resolve(audioFolder)) {
            return undefined;
        }

        const destination = path.join(audioFolder, filename);
        if (await fileExists(destination)) {
            this.logger?.warn(`⚠️ Not moving ${filename}: ${destination} already exists`);
            return undefined;
        }

        try {
            await fs.mkdir(audioFolder, { recursive: true });
            await moveFile(media.path, destination);
        } catch (error) {
            // The transcript is already written; the file just stays put
            this.logger?.warn(`⚠️ Could not move ${media.path} to ${this.config.audioFolderName}: ${describeError(error)}`);
            return undefined;
        }

        await this.ownership?.apply(destination);
        this.logger?.info(`✅ Moved ${filename} to ${this.config.audioFolderName} folder`);
        return destination;
    }
}
