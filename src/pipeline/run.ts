/**
 * Vault run
 *
 * lock -> folders -> templates -> discover -> per file: transcribe, write,
 * match notes, insert links -> link every other transcript already in the
 * transcripts folder -> hand both folders to the configured owner -> unlock.
 *
 * Files are processed one at a time. A failure for one file or one note is
 * logged and recorded in the summary; the run carries on with the next one.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
    Configuration,
    TRANSCRIPT_SUFFIX,
    getAudioFolder,
    getTranscriptsFolder,
    loadTemplates,
} from '../config/config';
import { LockManager, withLock } from '../lock/lock-manager';
import { MediaFile, findMediaFiles } from '../media/discover';
import { LinkInserter, orderForInsertion } from '../notes/link-inserter';
import { NoteMatcher } from '../notes/note-matcher';
import { NoteIOError, TemplateError, TranscriptionError, describeError } from '../shared/errors';
import { Logger } from '../shared/logger';
import { ChownFn, OwnershipFixer } from '../shared/ownership';
import { fileExists, readTextFile } from '../shared/text-file';
import { listFiles } from '../shared/vault-walk';
import { TranscriptionProvider } from '../transcripts/provider';
import { Transcript } from '../transcripts/types';
import { TranscriptWriter } from '../transcripts/writer';

export interface PipelineDeps {
    provider: TranscriptionProvider;
    logger: Logger;
    /** Defaults to a LockManager on config.lockFile */
    lock?: LockManager;
    now?: () => Date;
    /** Defaults to fs.chown; only called when an owner is configured */
    chown?: ChownFn;
}

export type FailureStage = TranscriptionError['stage'] | 'template' | 'link' | 'unknown';

export interface FileFailure {
    path: string;
    stage: FailureStage;
    message: string;
}

export interface RunSummary {
    discovered: number;
    transcribed: number;
    /** Media whose transcript already existed */
    skipped: number;
    failed: FileFailure[];
    linksInserted: number;
    notesUpdated: string[];
    noteFailures: FileFailure[];
}

function toFailure(filePath: string, error: unknown): FileFailure {
    if (error instanceof TranscriptionError) {
        return { path: filePath, stage: error.stage, message: error.message };
    }
    if (error instanceof TemplateError) {
        return { path: filePath, stage: 'template', message: error.message };
    }
    return { path: filePath, stage: 'unknown', message: describeError(error) };
}

/**
 * Basenames of the transcripts already in the transcripts folder
 */
export async function listTranscriptBasenames(config: Configuration): Promise<string[]> {
    const suffix = `${TRANSCRIPT_SUFFIX}.md`;
    const files = await listFiles(getTranscriptsFolder(config), {
        recursive: false,
        filter: (filePath) => path.basename(filePath).endsWith(suffix),
    });
    return files
        .map((filePath) => path.basename(filePath).slice(0, -suffix.length))
        .filter((basename) => basename.length > 0);
}

class VaultRun {
    private readonly writer: TranscriptWriter;
    private readonly matcher: NoteMatcher;
    private readonly inserter: LinkInserter;
    private readonly notesUpdated = new Set<string>();
    private readonly summary: RunSummary = {
        discovered: 0,
        transcribed: 0,
        skipped: 0,
        failed: [],
        linksInserted: 0,
        notesUpdated: [],
        noteFailures: [],
    };

    constructor(
        private readonly config: Configuration,
        private readonly deps: PipelineDeps,
        templates: { transcript: string; link: string },
        ownership: OwnershipFixer
    ) {
        this.writer = new TranscriptWriter({
            config,
            provider: deps.provider,
            template: templates.transcript,
            logger: deps.logger,
            now: deps.now,
            ownership,
        });
        this.matcher = new NoteMatcher(config, deps.logger);
        this.inserter = new LinkInserter({ config, linkTemplate: templates.link, logger: deps.logger });
    }

    async execute(): Promise<RunSummary> {
        const { logger } = this.deps;

        const mediaFiles = await findMediaFiles(this.config, logger);
        this.summary.discovered = mediaFiles.length;

        if (mediaFiles.length === 0) {
            logger.info('No new files to transcribe');
        } else {
            logger.info(`📄 Found ${mediaFiles.length} file(s) to transcribe`);
        }

        const linked = new Set<string>();
        for (const media of mediaFiles) {
            if (await this.processMedia(media)) {
                linked.add(media.basename);
            }
        }

        logger.info('🔗 Linking transcripts to notes...');
        for (const basename of await listTranscriptBasenames(this.config)) {
            if (linked.has(basename)) continue;
            await this.linkExisting(basename);
        }

        this.summary.notesUpdated = [...this.notesUpdated].sort();
        return this.summary;
    }

    /**
     * Transcribe and link one media file. Returns false if the file failed.
     */
    private async processMedia(media: MediaFile): Promise<boolean> {
        try {
            const transcript = await this.writer.writeTranscript(media);
            if (transcript.existed) {
                this.summary.skipped++;
            } else {
                this.summary.transcribed++;
            }
            await this.linkTranscript(transcript);
            return true;
        } catch (error) {
            const failure = toFailure(media.path, error);
            this.summary.failed.push(failure);
            this.deps.logger.error(`❌ ${failure.stage} failed for ${media.path}: ${failure.message}`);
            return false;
        }
    }

    private async linkExisting(basename: string): Promise<void> {
        const transcriptPath = path.join(getTranscriptsFolder(this.config), `${basename}${TRANSCRIPT_SUFFIX}.md`);
        try {
            const transcript: Transcript = {
                mediaBasename: basename,
                path: transcriptPath,
                body: await readTextFile(transcriptPath, this.config.encoding),
                segments: [],
                existed: true,
            };
            await this.linkTranscript(transcript);
        } catch (error) {
            const failure = { ...toFailure(transcriptPath, error), stage: 'link' as const };
            this.summary.failed.push(failure);
            this.deps.logger.error(`❌ Linking failed for ${transcriptPath}: ${failure.message}`);
        }
    }

    /**
     * Insert the transcript link into every note that embeds the media file
     */
    private async linkTranscript(transcript: Transcript): Promise<void> {
        const matches = await this.matcher.findNotesWithAudio(transcript.mediaBasename);

        for (const noteMatches of orderForInsertion(matches)) {
            for (const match of noteMatches) {
                try {
                    if (await this.inserter.insertLink(match, transcript)) {
                        this.summary.linksInserted++;
                        this.notesUpdated.add(match.notePath);
                    }
                } catch (error) {
                    if (!(error instanceof NoteIOError)) throw error;
                    this.summary.noteFailures.push({ path: error.notePath, stage: 'link', message: error.message });
                    this.deps.logger.warn(`⚠️ ${error.message}`);
                }
            }
        }
    }
}

async function ensureFolders(config: Configuration): Promise<void> {
    await fs.mkdir(getTranscriptsFolder(config), { recursive: true });
    await fs.mkdir(config.tempDir, { recursive: true });
}

async function fixFolderOwnership(config: Configuration, ownership: OwnershipFixer): Promise<void> {
    for (const folder of [getAudioFolder(config), getTranscriptsFolder(config)]) {
        if (await fileExists(folder)) {
            await ownership.apply(folder);
        }
    }
}

/**
 * Run the whole pipeline against a vault under the vault lock.
 * Throws LockError if another live run holds the lock, ConfigurationError
 * if the templates cannot be read.
 */
export async function runPipeline(config: Configuration, deps: PipelineDeps): Promise<RunSummary> {
    const { logger } = deps;
    const lock = deps.lock ?? new LockManager(config.lockFile);
    const ownership = new OwnershipFixer(config.fileOwner, logger, deps.chown);

    return withLock(lock, async () => {
        logger.info('🎙️ Starting vault transcription');
        logger.info(`Vault: ${config.vaultPath}`);
        logger.info(`Transcripts folder: ${getTranscriptsFolder(config)}`);

        await ensureFolders(config);
        const templates = await loadTemplates(config);

        const summary = await new VaultRun(config, deps, templates, ownership).execute();
        await fixFolderOwnership(config, ownership);

        logger.info('📊 Summary:');
        logger.info(`   Transcribed: ${summary.transcribed}/${summary.discovered}`);
        logger.info(`   Links inserted: ${summary.linksInserted} (${summary.notesUpdated.length} note(s))`);
        if (summary.failed.length > 0 || summary.noteFailures.length > 0) {
            logger.warn(`   Failures: ${summary.failed.length} file(s), ${summary.noteFailures.length} note(s)`);
        }
        logger.info('✨ Done!');
        return summary;
    });
}
