/**
 * Configuration types, defaults and validation
 *
 * A configuration file (YAML or JSON, snake_case keys) is merged over
 * DEFAULT_RAW_CONFIG, type-checked, validated against the file system and
 * frozen into a Configuration that every component receives explicitly.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../shared/errors';
import { LOG_LEVELS, LogLevel } from '../shared/logger';
import { FileOwner, resolveFileOwner } from '../shared/ownership';
import { TEXT_ENCODINGS, TextEncoding, isTextEncoding, readTextFile } from '../shared/text-file';

// ============ INTERFACES ============

export const LINK_FORMAT_STYLES = ['wikilink', 'standard', 'custom'] as const;
export type LinkFormatStyle = typeof LINK_FORMAT_STYLES[number];

/**
 * Whisper model sizes
 */
export const WHISPER_MODELS = ['tiny', 'base', 'small', 'medium', 'large', 'large-v2', 'large-v3'] as const;
export type WhisperModel = typeof WHISPER_MODELS[number];

/**
 * Validated, immutable run settings. All paths are absolute.
 */
export interface Configuration {
    readonly vaultPath: string;
    readonly audioFolderName: string;
    readonly transcriptsFolderName: string;
    readonly tempDir: string;

    readonly transcriptTemplatePath: string;
    readonly linkTemplatePath: string;

    readonly whisperModel: WhisperModel;
    /** 'auto' or an ISO 639 code */
    readonly language: string;

    readonly lockFile: string;
    readonly logFile: string;
    readonly encoding: TextEncoding;

    /** Lowercase, each starting with '.' */
    readonly audioExtensions: readonly string[];
    readonly videoExtensions: readonly string[];

    readonly linkFormatPrefix: string;
    readonly linkFormatStyle: LinkFormatStyle;

    readonly autoMoveFiles: boolean;
    readonly createTimestamps: boolean;
    readonly skipExistingTranscripts: boolean;
    readonly recursiveSearch: boolean;

    readonly logLevel: LogLevel;
    readonly consoleLogging: boolean;
    readonly fileLogging: boolean;

    /** Owner given to transcripts, moved media and the two folders; null leaves ownership alone */
    readonly fileOwner: FileOwner | null;
}

/** A name or a numeric id */
const ownerSettingSchema = z.union([z.string().min(1), z.number().int().nonnegative()]).nullable();

/**
 * Shape of the configuration file
 */
const rawConfigSchema = z.object({
    vault_path: z.string().min(1),
    audio_folder_name: z.string().min(1),
    transcripts_folder_name: z.string().min(1),
    /** null: the system temporary directory */
    temp_dir: z.string().min(1).nullable(),
    transcript_template_path: z.string().min(1),
    link_template_path: z.string().min(1),
    whisper_model: z.string(),
    language: z.string(),
    log_file: z.string().min(1),
    lock_file: z.string().min(1),
    encoding: z.string(),
    audio_extensions: z.array(z.string()),
    video_extensions: z.array(z.string()),
    link_format_prefix: z.string(),
    link_format_style: z.string(),
    auto_move_files: z.boolean(),
    create_timestamps: z.boolean(),
    skip_existing_transcripts: z.boolean(),
    recursive_search: z.boolean(),
    log_level: z.string(),
    console_logging: z.boolean(),
    file_logging: z.boolean(),
    owner_user: ownerSettingSchema,
    owner_group: ownerSettingSchema,
});

export type RawConfig = z.infer<typeof rawConfigSchema>;

export interface LoadConfigOptions {
    /** Base for relative template paths (defaults to the package root) */
    projectRoot?: string;
    /** Base for every other relative path (defaults to process.cwd()) */
    cwd?: string;
}

// ============ DEFAULTS ============

export const DEFAULT_RAW_CONFIG: RawConfig = {
    vault_path: '~/Notes',
    audio_folder_name: 'Audio',
    transcripts_folder_name: 'Audio-Transcripts',
    temp_dir: null,

    transcript_template_path: 'templates/transcript-template.md',
    link_template_path: 'templates/link-template.md',

    whisper_model: 'medium',
    language: 'auto',

    log_file: './logs/vault-transcriber.log',
    lock_file: './logs/vault-transcriber.lock',
    encoding: 'utf-8',

    audio_extensions: ['.mp3', '.wav', '.m4a', '.flac', '.ogg', '.aac', '.wma'],
    video_extensions: ['.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv', '.webm'],

    link_format_prefix: '📝 **Transcript:**',
    link_format_style: 'wikilink',

    auto_move_files: true,
    create_timestamps: true,
    skip_existing_transcripts: true,
    recursive_search: true,

    log_level: 'INFO',
    console_logging: true,
    file_logging: true,

    owner_user: null,
    owner_group: null,
};

export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

export const CONFIG_FILE_CANDIDATES = ['config.yaml', 'config.yml', 'config.json'];

export const TRANSCRIPT_SUFFIX = '_transcript';

const EXTENSION_PATTERN = /^\.[a-z0-9]+$/i;
const LANGUAGE_PATTERN = /^[a-z]{2,3}$/i;

// ============ PARSING ============

type ConfigFormat = 'json' | 'yaml';

export function getConfigFormat(filePath: string): ConfigFormat {
    const ext = path.extname(filePath).toLowerCase();
    if (ext === '.json') return 'json';
    if (ext === '.yaml' || ext === '.yml') return 'yaml';
    throw new ConfigurationError('config', `Unsupported configuration file format: ${ext || '(none)'}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseConfigText(text: string, format: ConfigFormat): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = format === 'json' ? JSON.parse(text) : parseYaml(text);
    } catch (error) {
        throw new ConfigurationError('config', `Invalid configuration file format: ${describeError(error)}`);
    }

    // An empty YAML document means "all defaults"
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
        throw new ConfigurationError('config', 'Configuration must be a mapping of keys to values');
    }
    return parsed;
}

/**
 * Expand ~ and resolve relative paths against baseDir
 */
export function expandPath(value: string, baseDir: string): string {
    if (value === '~') return os.homedir();
    if (value.startsWith('~/') || value.startsWith('~\\')) {
        return path.join(os.homedir(), value.slice(2));
    }
    return path.resolve(baseDir, value);
}

// ============ VALIDATION ============

async function statOrNull(filePath: string) {
    try {
        return await fs.stat(filePath);
    } catch {
        return null;
    }
}

function normalizeExtensions(field: string, values: string[]): string[] {
    if (values.length === 0) {
        throw new ConfigurationError(field, 'At least one extension must be specified');
    }
    return values.map((value) => {
        if (!EXTENSION_PATTERN.test(value)) {
            throw new ConfigurationError(field, `Malformed extension "${value}" (expected e.g. ".mp3")`);
        }
        return value.toLowerCase();
    });
}

function isLinkFormatStyle(value: string): value is LinkFormatStyle {
    return LINK_FORMAT_STYLES.some((candidate) => candidate === value);
}

function isWhisperModel(value: string): value is WhisperModel {
    return WHISPER_MODELS.some((candidate) => candidate === value);
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((candidate) => candidate === value);
}

async function requireTemplate(field: string, templatePath: string): Promise<void> {
    const stat = await statOrNull(templatePath);
    if (!stat || !stat.isFile()) {
        throw new ConfigurationError(field, `Template file not found: ${templatePath}`);
    }

    let content: string;
    try {
        content = await fs.readFile(templatePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(field, `Template file is not readable: ${templatePath} (${describeError(error)})`);
    }
    if (content.trim().length === 0) {
        throw new ConfigurationError(field, `Template file is empty: ${templatePath}`);
    }
}

/**
 * Validate a merged raw config and build the frozen Configuration.
 * Checks run in a fixed order and the first failure wins.
 */
export async function validateConfig(input: Record<string, unknown>, options: LoadConfigOptions = {}): Promise<Configuration> {
    const projectRoot = options.projectRoot ?? PROJECT_ROOT;
    const cwd = options.cwd ?? process.cwd();

    const result = rawConfigSchema.safeParse({ ...DEFAULT_RAW_CONFIG, ...input });
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ConfigurationError(issue.path.join('.') || 'config', issue.message);
    }
    const raw = result.data;

    const vaultPath = expandPath(raw.vault_path, cwd);
    const vaultStat = await statOrNull(vaultPath);
    if (!vaultStat) {
        throw new ConfigurationError('vault_path', `Vault path does not exist: ${vaultPath}`);
    }
    if (!vaultStat.isDirectory()) {
        throw new ConfigurationError('vault_path', `Vault path is not a directory: ${vaultPath}`);
    }

    const audioExtensions = normalizeExtensions('audio_extensions', raw.audio_extensions);
    const videoExtensions = normalizeExtensions('video_extensions', raw.video_extensions);

    const linkFormatStyle = raw.link_format_style;
    if (!isLinkFormatStyle(linkFormatStyle)) {
        throw new ConfigurationError(
            'link_format_style',
            `Invalid link format style "${linkFormatStyle}" (expected one of ${LINK_FORMAT_STYLES.join(', ')})`
        );
    }

    const transcriptTemplatePath = expandPath(raw.transcript_template_path, projectRoot);
    const linkTemplatePath = expandPath(raw.link_template_path, projectRoot);

    if (linkFormatStyle === 'custom' && !(await statOrNull(linkTemplatePath))) {
        throw new ConfigurationError('link_template_path', `Custom link style needs a link template: ${linkTemplatePath}`);
    }

    await requireTemplate('transcript_template_path', transcriptTemplatePath);
    await requireTemplate('link_template_path', linkTemplatePath);

    if (!isWhisperModel(raw.whisper_model)) {
        throw new ConfigurationError(
            'whisper_model',
            `Invalid whisper model "${raw.whisper_model}" (expected one of ${WHISPER_MODELS.join(', ')})`
        );
    }
    if (raw.language !== 'auto' && !LANGUAGE_PATTERN.test(raw.language)) {
        throw new ConfigurationError('language', `Invalid language "${raw.language}" (expected "auto" or an ISO code)`);
    }
    if (!isLogLevel(raw.log_level)) {
        throw new ConfigurationError('log_level', `Invalid log level "${raw.log_level}" (expected one of ${LOG_LEVELS.join(', ')})`);
    }
    const encoding = raw.encoding.toLowerCase();
    if (!isTextEncoding(encoding)) {
        throw new ConfigurationError('encoding', `Unsupported text encoding "${raw.encoding}" (expected one of ${TEXT_ENCODINGS.join(', ')})`);
    }

    const fileOwner = await resolveFileOwner(raw.owner_user, raw.owner_group);

    const config: Configuration = {
        vaultPath,
        audioFolderName: raw.audio_folder_name,
        transcriptsFolderName: raw.transcripts_folder_name,
        tempDir: raw.temp_dir === null ? os.tmpdir() : expandPath(raw.temp_dir, cwd),
        transcriptTemplatePath,
        linkTemplatePath,
        whisperModel: raw.whisper_model,
        language: raw.language.toLowerCase(),
        lockFile: expandPath(raw.lock_file, cwd),
        logFile: expandPath(raw.log_file, cwd),
        encoding,
        audioExtensions: Object.freeze(audioExtensions),
        videoExtensions: Object.freeze(videoExtensions),
        linkFormatPrefix: raw.link_format_prefix,
        linkFormatStyle,
        autoMoveFiles: raw.auto_move_files,
        createTimestamps: raw.create_timestamps,
        skipExistingTranscripts: raw.skip_existing_transcripts,
        recursiveSearch: raw.recursive_search,
        logLevel: raw.log_level,
        consoleLogging: raw.console_logging,
        fileLogging: raw.file_logging,
        fileOwner: fileOwner ? Object.freeze(fileOwner) : null,
    };

    return Object.freeze(config);
}

// ============ LOAD ============

/**
 * Load and validate a configuration file.
 * Throws ConfigurationError naming the failing field; never returns a partial config.
 */
export async function loadConfig(configPath: string, options: LoadConfigOptions = {}): Promise<Configuration> {
    const format = getConfigFormat(configPath);

    let text: string;
    try {
        text = await fs.readFile(configPath, 'utf-8');
    } catch {
        throw new ConfigurationError('config', `Configuration file not found: ${configPath}`);
    }

    return validateConfig(parseConfigText(text, format), options);
}

/**
 * Find config.yaml / config.yml / config.json in a directory
 */
export async function findDefaultConfigFile(dir: string = process.cwd()): Promise<string | null> {
    for (const candidate of CONFIG_FILE_CANDIDATES) {
        const filePath = path.join(dir, candidate);
        const stat = await statOrNull(filePath);
        if (stat?.isFile()) return filePath;
    }
    return null;
}

// ============ RESOLVED PATHS ============

export function getAudioFolder(config: Configuration): string {
    return path.join(config.vaultPath, config.audioFolderName);
}

export function getTranscriptsFolder(config: Configuration): string {
    return path.join(config.vaultPath, config.transcriptsFolderName);
}

export function getSupportedExtensions(config: Configuration): string[] {
    return [...config.audioExtensions, ...config.videoExtensions];
}

export function getTranscriptName(basename: string): string {
    return `${basename}${TRANSCRIPT_SUFFIX}`;
}

export function getTranscriptPath(config: Configuration, basename: string): string {
    return path.join(getTranscriptsFolder(config), `${getTranscriptName(basename)}.md`);
}

// ============ TEMPLATES ============

export interface LoadedTemplates {
    transcript: string;
    link: string;
}

/**
 * Read both template files with the vault encoding
 */
export async function loadTemplates(config: Configuration): Promise<LoadedTemplates> {
    const read = async (field: string, templatePath: string): Promise<string> => {
        try {
            return await readTextFile(templatePath, config.encoding);
        } catch (error) {
            throw new ConfigurationError(field, `Error loading template ${templatePath}: ${describeError(error)}`);
        }
    };

    return {
        transcript: await read('transcript_template_path', config.transcriptTemplatePath),
        link: await read('link_template_path', config.linkTemplatePath),
    };
}
