import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, expectTypeOf, beforeEach, afterEach } from 'vitest';
import { toMediaFile } from '../../src/media/discover';
import { TranscriptionError, TranscriptionStage } from '../../src/shared/errors';
import { TranscriptWriter } from '../../src/transcripts/writer';
import {
    FakeProvider,
    TRANSCRIPT_TEMPLATE,
    TestVault,
    createRecordingLogger,
    createTestVault,
    textResult,
} from '../helpers/vault';

const NOW = new Date(2026, 0, 17, 8, 5, 3);

describe('TranscriptWriter', () => {
    let vault: TestVault;

    beforeEach(async () => {
        vault = await createTestVault();
        await vault.write({ 'Audio/clip.mp3': 'audio', 'loose.wav': 'audio' });
    });

    afterEach(async () => {
        await vault.cleanup();
    });

    const writerFor = async (provider: FakeProvider, overrides: Record<string, unknown> = {}) => {
        const logger = createRecordingLogger();
        const writer = new TranscriptWriter({
            config: await vault.config(overrides),
            provider,
            template: TRANSCRIPT_TEMPLATE,
            logger,
            now: () => NOW,
        });
        return { writer, logger };
    };

    it('transcribes and writes the rendered transcript', async () => {
        const provider = new FakeProvider(() => textResult('hello world'));
        const { writer } = await writerFor(provider, { whisper_model: 'small', language: 'de' });
        const mediaPath = path.join(vault.vault, 'Audio', 'clip.mp3');

        const transcript = await writer.writeTranscript(toMediaFile(mediaPath));

        expect(provider.calls).toEqual([{ path: mediaPath, model: 'small', language: 'de' }]);
        expect(transcript).toEqual({
            mediaBasename: 'clip',
            path: path.join(vault.vault, 'transcripts', 'clip_transcript.md'),
            body: '# clip.mp3\n\nhello world\n\n\n',
            segments: [],
            existed: false,
        });
        expect(await vault.read('transcripts/clip_transcript.md')).toBe('# clip.mp3\n\nhello world\n\n\n');
    });

    it('returns an existing transcript without calling the provider', async () => {
        await vault.write({ 'transcripts/clip_transcript.md': 'already here' });
        const provider = new FakeProvider(() => textResult('new text'));
        const { writer } = await writerFor(provider);

        const transcript = await writer.writeTranscript(toMediaFile(path.join(vault.vault, 'Audio', 'clip.mp3')));

        expect(provider.calls).toEqual([]);
        expect(transcript.existed).toBe(true);
        expect(transcript.body).toBe('already here');
    });

    it('overwrites an existing transcript when skipping is off', async () => {
        await vault.write({ 'transcripts/clip_transcript.md': 'already here' });
        const provider = new FakeProvider(() => textResult('new text'));
        const { writer } = await writerFor(provider, { skip_existing_transcripts: false });

        const transcript = await writer.writeTranscript(toMediaFile(path.join(vault.vault, 'Audio', 'clip.mp3')));

        expect(transcript.existed).toBe(false);
        expect(await vault.read('transcripts/clip_transcript.md')).toBe('# clip.mp3\n\nnew text\n\n\n');
    });

    it('wraps a provider failure and writes nothing', async () => {
        const provider = new FakeProvider(() => new Error('model crashed'));
        const { writer } = await writerFor(provider);
        const mediaPath = path.join(vault.vault, 'Audio', 'clip.mp3');

        const error = await writer.writeTranscript(toMediaFile(mediaPath)).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TranscriptionError);
        if (error instanceof TranscriptionError) {
            expect(error.stage).toBe('transcribe');
            expect(error.mediaPath).toBe(mediaPath);
            expect(error.message).toBe(`[transcribe] ${mediaPath}: fake failed: model crashed`);
        }
        expect(await vault.exists('transcripts/clip_transcript.md')).toBe(false);
    });

    it('leaves the previous transcript untouched when re-transcribing fails', async () => {
        await vault.write({ 'transcripts/clip_transcript.md': 'already here' });
        const provider = new FakeProvider(() => new Error('model crashed'));
        const { writer } = await writerFor(provider, { skip_existing_transcripts: false });

        await expect(writer.writeTranscript(toMediaFile(path.join(vault.vault, 'Audio', 'clip.mp3'))))
            .rejects.toBeInstanceOf(TranscriptionError);

        expect(provider.calls).toHaveLength(1);
        expect(await vault.read('transcripts/clip_transcript.md')).toBe('already here');
        expect(await fs.readdir(path.join(vault.vault, 'transcripts'))).toEqual(['clip_transcript.md']);
    });

    it('reports a write failure at the write stage', async () => {
        await vault.write({ blocked: 'a file where the folder should be' });
        const provider = new FakeProvider(() => textResult('hello'));
        const { writer } = await writerFor(provider, { transcripts_folder_name: 'blocked' });

        const error = await writer.writeTranscript(toMediaFile(path.join(vault.vault, 'Audio', 'clip.mp3'))).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TranscriptionError);
        if (error instanceof TranscriptionError) {
            expect(error.stage).toBe('write');
        }
    });

    it('moves a media file into the audio folder after writing', async () => {
        const provider = new FakeProvider(() => textResult('hello'));
        const { writer } = await writerFor(provider, { auto_move_files: true });

        const transcript = await writer.writeTranscript(toMediaFile(path.join(vault.vault, 'loose.wav')));

        expect(transcript.movedTo).toBe(path.join(vault.vault, 'Audio', 'loose.wav'));
        expect(await vault.exists('loose.wav')).toBe(false);
        expect(await vault.read('Audio/loose.wav')).toBe('audio');
        expect(await vault.exists('transcripts/loose_transcript.md')).toBe(true);
    });

    it('does not move a file already in the audio folder', async () => {
        const provider = new FakeProvider(() => textResult('hello'));
        const { writer } = await writerFor(provider, { auto_move_files: true });

        const transcript = await writer.writeTranscript(toMediaFile(path.join(vault.vault, 'Audio', 'clip.mp3')));

        expect(transcript.movedTo).toBeUndefined();
        expect(await vault.exists('Audio/clip.mp3')).toBe(true);
    });

    it('keeps the file in place when the audio folder already has one by that name', async () => {
        await vault.write({ 'Audio/loose.wav': 'other audio' });
        const provider = new FakeProvider(() => textResult('hello'));
        const { writer, logger } = await writerFor(provider, { auto_move_files: true });

        const transcript = await writer.writeTranscript(toMediaFile(path.join(vault.vault, 'loose.wav')));

        expect(transcript.movedTo).toBeUndefined();
        expect(await vault.read('loose.wav')).toBe('audio');
        expect(await vault.read('Audio/loose.wav')).toBe('other audio');
        expect(logger.lines.filter((line) => line.startsWith('WARNING'))).toEqual([
            `WARNING ⚠️ Not moving loose.wav: ${path.join(vault.vault, 'Audio', 'loose.wav')} already exists`,
        ]);
    });

    it('reports failures only from the transcribe and write stages', () => {
        expectTypeOf<TranscriptionStage>().toEqualTypeOf<'transcribe' | 'write'>();
    });
});
