import path from 'path';
import process from 'process';
import fs from 'fs/promises';

import { BuildConfigSchema, type BuildArgs, type BuildConfig } from './tools/schemas.js';
import { DocxError, DocxErrorCode, getErrnoCode } from './tools/docx/errors.js';
import type { BuildPresentationOptions } from './tools/docx/types.js';
import type { LogLevel } from './utils/logger.js';

export const CONFIG_FILE_NAME = 'slides.config.json';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export interface ResolvedSettings {
    build: BuildPresentationOptions;
    logLevel: LogLevel;
    /** Config file that was applied, if any. */
    configPath: string | null;
}

/**
 * Load and validate a config file.
 *
 * A missing file yields an empty config unless the path was given
 * explicitly; malformed JSON or unknown keys are errors.
 */
export async function loadConfig(configPath: string, required = false): Promise<BuildConfig | null> {
    let raw: string;
    try {
        raw = await fs.readFile(configPath, 'utf8');
    } catch (error) {
        if (getErrnoCode(error) === 'ENOENT' && !required) {
            return null;
        }
        throw new DocxError(
            `Failed to read config ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
            DocxErrorCode.INVALID_CONFIG,
            { configPath },
        );
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new DocxError(
            `Config ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            DocxErrorCode.INVALID_CONFIG,
            { configPath },
        );
    }

    const parsed = BuildConfigSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new DocxError(`Invalid config ${configPath}: ${issues}`, DocxErrorCode.INVALID_CONFIG, {
            configPath,
            issues: parsed.error.issues,
        });
    }
    return parsed.data;
}

/**
 * Merge defaults, the config file and CLI flags (later wins).
 *
 * The base directory defaults to the working directory; the config file
 * defaults to slides.config.json inside it.
 */
export async function resolveSettings(args: BuildArgs, cwd: string = process.cwd()): Promise<ResolvedSettings> {
    const baseDir = path.resolve(cwd, args.dir ?? '.');
    const configPath = args.config
        ? path.resolve(cwd, args.config)
        : path.join(baseDir, CONFIG_FILE_NAME);

    const loaded = await loadConfig(configPath, args.config !== undefined);
    const config: BuildConfig = loaded ?? {};

    return {
        build: {
            baseDir,
            outputPath: args.output ? path.resolve(cwd, args.output) : config.outputFile,
            slideCount: args.count ?? config.slideCount,
            title: args.title ?? config.title,
            subtitle: args.subtitle ?? config.subtitle,
        },
        logLevel: args.logLevel ?? config.logLevel ?? DEFAULT_LOG_LEVEL,
        configPath: loaded ? configPath : null,
    };
}
