/**
 * Shared body of both strategies: one engine call into a fresh session
 * directory, then output and size checks
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FileManager } from '../../utils/FileManager';
import { describeError, logger } from '../../utils/logger';
import { classifyExtractionError } from '../core/ErrorClassifier';
import { ExtractionEngine, ExtractOptions, Platform, StrategyKind, StrategyResult } from '../core/types';

// Titles are cut at 80 bytes
export const OUTPUT_TEMPLATE = '%(title).80B.%(ext)s';

export interface StrategyDependencies {
    engine: ExtractionEngine;
    fileManager: FileManager;
    maxFileSizeBytes: number;
}

export async function runExtraction(
    deps: StrategyDependencies,
    kind: StrategyKind,
    url: string,
    platform: Platform,
    options: ExtractOptions,
): Promise<StrategyResult> {
    const { engine, fileManager } = deps;
    const sessionId = `${platform}_${uuidv4()}`;
    const sessionDir = await fileManager.createSessionDir(sessionId);
    const release = (): Promise<void> => fileManager.cleanupSession(sessionId);

    let title: string | undefined;
    try {
        const metadata = await engine.extract(url, {
            ...options,
            outputTemplate: path.join(sessionDir, OUTPUT_TEMPLATE),
        });
        title = metadata.title;
    } catch (error: unknown) {
        await release();
        const message = describeError(error);
        const classification = classifyExtractionError(message);
        logger.warn(`[${kind}] Extraction failed`, { sessionId, classification, error: message });
        return { ok: false, classification, message };
    }

    try {
        return await inspectOutput(deps, kind, sessionId, title, release);
    } catch (error: unknown) {
        await release();
        return { ok: false, classification: 'generic_extraction_error', message: describeError(error) };
    }
}

async function inspectOutput(
    deps: StrategyDependencies,
    kind: StrategyKind,
    sessionId: string,
    title: string | undefined,
    release: () => Promise<void>,
): Promise<StrategyResult> {
    const { fileManager, maxFileSizeBytes } = deps;
    const files = await fileManager.listSessionFiles(sessionId);
    const filePath = files[0];
    if (filePath === undefined) {
        await release();
        return {
            ok: false,
            classification: 'generic_extraction_error',
            message: 'Extraction finished without producing a file',
        };
    }

    const sizeBytes = await fileManager.getFileSize(filePath);
    if (sizeBytes > maxFileSizeBytes) {
        await release();
        logger.info(`[${kind}] File over size limit removed`, { sessionId, sizeBytes, maxFileSizeBytes });
        return {
            ok: false,
            classification: 'file_too_large',
            message: `File is ${formatMegabytes(sizeBytes)}, the limit is ${formatMegabytes(maxFileSizeBytes)}`,
        };
    }

    logger.info(`[${kind}] ✅ Extraction complete`, { sessionId, sizeBytes });
    return {
        ok: true,
        filePath,
        title: title || path.parse(filePath).name,
        sizeBytes,
        sessionId,
        release,
    };
}

function formatMegabytes(bytes: number): string {
    return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}
