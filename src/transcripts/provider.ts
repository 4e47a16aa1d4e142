/**
 * Transcription providers
 *
 * The engine only sees TranscriptionProvider. WhisperCliProvider runs the
 * local `whisper` command and reads back its JSON output.
 */

import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import { z } from 'zod';
import { ProviderError, describeError } from '../shared/errors';
import { TranscriptionRequest, TranscriptionResult } from './types';

const execFileAsync = promisify(execFile);

export interface TranscriptionProvider {
    /** Human-readable name for logs */
    readonly name: string;
    transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;
}

/**
 * Whisper JSON output (only the fields we read)
 */
const whisperOutputSchema = z.object({
    text: z.string().default(''),
    segments: z.array(z.object({
        start: z.number(),
        end: z.number(),
        text: z.string(),
    })).default([]),
});

export interface WhisperCliOptions {
    /** Folder for whisper's output files */
    tempDir: string;
    /** Command to run (defaults to "whisper" on PATH) */
    command?: string;
    /** Per-file timeout in ms */
    timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 2 * 60 * 60 * 1000;

export function buildWhisperArgs(request: TranscriptionRequest, outputDir: string): string[] {
    const args = [
        request.path,
        '--model', request.model,
        '--output_format', 'json',
        '--output_dir', outputDir,
    ];

    if (request.language !== 'auto') {
        args.push('--language', request.language);
    }
    return args;
}

export function parseWhisperOutput(data: string): TranscriptionResult {
    let json: unknown;
    try {
        json = JSON.parse(data);
    } catch (error) {
        throw new ProviderError(`Whisper output is not JSON: ${describeError(error)}`, { cause: error });
    }

    const result = whisperOutputSchema.safeParse(json);
    if (!result.success) {
        throw new ProviderError(`Unexpected whisper output: ${result.error.issues[0].message}`);
    }
    return { text: result.data.text.trim(), segments: result.data.segments };
}

export class WhisperCliProvider implements TranscriptionProvider {
    readonly name = 'whisper';
    private readonly command: string;
    private readonly timeoutMs: number;

    constructor(private readonly options: WhisperCliOptions) {
        this.command = options.command ?? 'whisper';
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    /**
     * Check that the whisper command can be run
     */
    async checkAvailable(): Promise<boolean> {
        try {
            await execFileAsync(this.command, ['--help'], { timeout: 30_000 });
            return true;
        } catch {
            return false;
        }
    }

    async transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
        // A per-run subfolder keeps concurrent temp output apart
        const outputDir = await fs.mkdtemp(path.join(this.options.tempDir, 'vault-transcriber-'));

        try {
            try {
                await execFileAsync(this.command, buildWhisperArgs(request, outputDir), {
                    maxBuffer: 50 * 1024 * 1024,
                    timeout: this.timeoutMs,
                });
            } catch (error) {
                throw new ProviderError(`Whisper failed: ${describeError(error)}`, { cause: error });
            }

            const stem = path.basename(request.path, path.extname(request.path));
            const jsonPath = path.join(outputDir, `${stem}.json`);

            let data: string;
            try {
                data = await fs.readFile(jsonPath, 'utf-8');
            } catch (error) {
                throw new ProviderError(`Failed to read whisper output: ${jsonPath}`, { cause: error });
            }
            return parseWhisperOutput(data);
        } finally {
            await fs.rm(outputDir, { recursive: true, force: true });
        }
    }
}
