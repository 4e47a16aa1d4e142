/**
 * vault-transcriber CLI
 *
 * Usage:
 *   vault-transcriber run [-c config.yaml]
 *   vault-transcriber init <path> [--type obsidian|logseq|foam|generic]
 *   vault-transcriber check [-c config.yaml]
 */

import { Command } from 'commander';
import { Configuration, findDefaultConfigFile, loadConfig } from '../config/config';
import { CONFIG_PRESETS, createExampleConfig } from '../config/examples';
import { runPipeline } from '../pipeline/run';
import { ConfigurationError, LockError, describeError } from '../shared/errors';
import { Logger, createConsoleLogger, createLogger } from '../shared/logger';
import { TranscriptionProvider, WhisperCliProvider } from '../transcripts/provider';

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_LOCKED = 3;

export interface CheckableProvider extends TranscriptionProvider {
    checkAvailable(): Promise<boolean>;
}

export interface CliDeps {
    createProvider: (config: Configuration) => CheckableProvider;
    createLogger: (config: Configuration) => Logger;
    /** Output for messages printed before a logger exists */
    console: Logger;
}

export const defaultCliDeps: CliDeps = {
    createProvider: (config) => new WhisperCliProvider({ tempDir: config.tempDir }),
    createLogger: (config) => createLogger({
        level: config.logLevel,
        console: config.consoleLogging,
        file: config.fileLogging,
        logFile: config.logFile,
    }),
    console: createConsoleLogger(),
};

async function resolveConfigPath(option: string | undefined): Promise<string> {
    if (option) return option;
    const found = await findDefaultConfigFile();
    if (!found) {
        throw new ConfigurationError('config', 'No configuration file given and no config.yaml/config.yml/config.json in the current directory');
    }
    return found;
}

async function loadCliConfig(option: string | undefined, deps: CliDeps): Promise<Configuration | null> {
    try {
        return await loadConfig(await resolveConfigPath(option));
    } catch (error) {
        if (error instanceof ConfigurationError) {
            deps.console.error(`Configuration error: ${error.message}`);
            return null;
        }
        throw error;
    }
}

const WHISPER_MISSING = 'Whisper is not installed. Install it with: pip install openai-whisper';

/**
 * Transcribe and link the vault. Returns the process exit code.
 */
export async function runCommand(configOption: string | undefined, deps: CliDeps = defaultCliDeps): Promise<number> {
    const config = await loadCliConfig(configOption, deps);
    if (!config) return EXIT_USER_ERROR;

    const logger = deps.createLogger(config);
    try {
        const provider = deps.createProvider(config);
        if (!(await provider.checkAvailable())) {
            logger.error(WHISPER_MISSING);
            return EXIT_SYSTEM_ERROR;
        }

        const summary = await runPipeline(config, { provider, logger });
        return summary.failed.length > 0 ? EXIT_SYSTEM_ERROR : EXIT_SUCCESS;
    } catch (error) {
        if (error instanceof LockError) {
            logger.warn(`Another instance is already running: ${error.message}`);
            return EXIT_LOCKED;
        }
        if (error instanceof ConfigurationError) {
            logger.error(`Configuration error: ${error.message}`);
            return EXIT_USER_ERROR;
        }
        logger.error(`Unexpected error: ${describeError(error)}`);
        return EXIT_SYSTEM_ERROR;
    } finally {
        await logger.close();
    }
}

/**
 * Validate the configuration and the whisper install without touching the vault
 */
export async function checkCommand(configOption: string | undefined, deps: CliDeps = defaultCliDeps): Promise<number> {
    const config = await loadCliConfig(configOption, deps);
    if (!config) return EXIT_USER_ERROR;

    deps.console.info(`✅ Configuration OK (vault: ${config.vaultPath}, link style: ${config.linkFormatStyle})`);

    if (!(await deps.createProvider(config).checkAvailable())) {
        deps.console.error(WHISPER_MISSING);
        return EXIT_SYSTEM_ERROR;
    }
    deps.console.info(`✅ Whisper ready (model: ${config.whisperModel}, language: ${config.language})`);
    return EXIT_SUCCESS;
}

export async function initCommand(filePath: string, preset: string, deps: CliDeps = defaultCliDeps): Promise<number> {
    try {
        await createExampleConfig(filePath, preset);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            deps.console.error(error.message);
            return EXIT_USER_ERROR;
        }
        throw error;
    }
    deps.console.info(`Example ${preset} configuration created at: ${filePath}`);
    return EXIT_SUCCESS;
}

export function buildProgram(deps: CliDeps = defaultCliDeps, setExitCode: (code: number) => void = (code) => { process.exitCode = code; }): Command {
    const program = new Command();

    program
        .name('vault-transcriber')
        .description('Transcribe audio/video in a markdown vault and link the transcripts into the notes that embed them');

    program
        .command('run', { isDefault: true })
        .description('Transcribe new media files and link transcripts into notes')
        .option('-c, --config <path>', 'configuration file (YAML or JSON)')
        .action(async (options: { config?: string }) => {
            setExitCode(await runCommand(options.config, deps));
        });

    program
        .command('init')
        .description('Write an example configuration file')
        .argument('<path>', 'where to write the configuration (.yaml, .yml or .json)')
        .option('-t, --type <preset>', `configuration preset (${CONFIG_PRESETS.join(', ')})`, 'generic')
        .action(async (filePath: string, options: { type: string }) => {
            setExitCode(await initCommand(filePath, options.type, deps));
        });

    program
        .command('check')
        .description('Validate the configuration and the whisper installation')
        .option('-c, --config <path>', 'configuration file (YAML or JSON)')
        .action(async (options: { config?: string }) => {
            setExitCode(await checkCommand(options.config, deps));
        });

    return program;
}
