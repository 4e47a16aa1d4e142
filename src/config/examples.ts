/**
 * Starter configurations for common note-taking apps
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { ConfigurationError, describeError } from '../shared/errors';
import { DEFAULT_RAW_CONFIG, RawConfig, getConfigFormat } from './config';

export const CONFIG_PRESETS = ['obsidian', 'logseq', 'foam', 'generic'] as const;
export type ConfigPreset = typeof CONFIG_PRESETS[number];

type PresetOverrides = Pick<RawConfig, 'vault_path' | 'audio_folder_name' | 'transcripts_folder_name' | 'link_format_style' | 'link_format_prefix'>;

const PRESETS: Record<ConfigPreset, PresetOverrides> = {
    obsidian: {
        vault_path: './vault',
        audio_folder_name: 'Audio',
        transcripts_folder_name: 'Audio-Transcripts',
        link_format_style: 'wikilink',
        link_format_prefix: '📝 **Transcript:**',
    },
    logseq: {
        vault_path: './vault',
        audio_folder_name: 'assets',
        transcripts_folder_name: 'transcripts',
        link_format_style: 'wikilink',
        link_format_prefix: '📝 **Transcript:**',
    },
    foam: {
        vault_path: './vault',
        audio_folder_name: 'attachments',
        transcripts_folder_name: 'transcripts',
        link_format_style: 'standard',
        link_format_prefix: '📝 **Transcript:**',
    },
    generic: {
        vault_path: './vault',
        audio_folder_name: 'media',
        transcripts_folder_name: 'transcripts',
        link_format_style: 'standard',
        link_format_prefix: '📝 **Transcript:**',
    },
};

export function isConfigPreset(value: string): value is ConfigPreset {
    return CONFIG_PRESETS.some((candidate) => candidate === value);
}

export function buildExampleConfig(preset: ConfigPreset): RawConfig {
    return { ...DEFAULT_RAW_CONFIG, ...PRESETS[preset] };
}

export function serializeConfig(raw: RawConfig, filePath: string): string {
    return getConfigFormat(filePath) === 'json'
        ? `${JSON.stringify(raw, null, 2)}\n`
        : stringifyYaml(raw);
}

/**
 * Write a starter config file; the format follows the file suffix.
 * An existing file is never overwritten.
 */
export async function createExampleConfig(filePath: string, preset: string = 'generic'): Promise<RawConfig> {
    if (!isConfigPreset(preset)) {
        throw new ConfigurationError('config_type', `Unknown configuration type "${preset}" (expected one of ${CONFIG_PRESETS.join(', ')})`);
    }

    const raw = buildExampleConfig(preset);
    const content = serializeConfig(raw, filePath);

    try {
        await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
        throw new ConfigurationError('config', `Error creating example configuration ${filePath}: ${describeError(error)}`);
    }

    return raw;
}
