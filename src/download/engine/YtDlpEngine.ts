/**
 * YtDlpEngine - Extraction engine backed by the yt-dlp binary
 *
 * A call without `outputTemplate` only probes metadata; with it, yt-dlp
 * downloads into the template and still prints the info JSON on stdout.
 */

import { spawn } from 'child_process';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { ExtractionEngine, ExtractionMetadata, ExtractOptions } from '../core/types';

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

const YtDlpFormatSchema = z.object({
    format_id: z.string(),
    ext: z.string().nullish(),
    width: z.number().nullish(),
    height: z.number().nullish(),
    vcodec: z.string().nullish(),
    acodec: z.string().nullish(),
});

const YtDlpInfoSchema = z.object({
    title: z.string().nullish(),
    description: z.string().nullish(),
    duration: z.number().nullish(),
    uploader: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    width: z.number().nullish(),
    height: z.number().nullish(),
    ext: z.string().nullish(),
    webpage_url: z.string().nullish(),
    formats: z.array(YtDlpFormatSchema).nullish(),
});

export class ExtractionEngineError extends Error {
    constructor(
        message: string,
        readonly exitCode: number | null,
    ) {
        super(message);
        this.name = 'ExtractionEngineError';
    }
}

export interface YtDlpEngineOptions {
    binary?: string;
    timeoutMs?: number;
}

export class YtDlpEngine implements ExtractionEngine {
    private readonly binary: string;
    private readonly timeoutMs: number;

    constructor(options: YtDlpEngineOptions = {}) {
        this.binary = options.binary ?? 'yt-dlp';
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    async extract(url: string, options: ExtractOptions = {}): Promise<ExtractionMetadata> {
        const args = this.buildArgs(url, options);
        logger.debug('yt-dlp invoked', { url, download: !!options.outputTemplate });
        const output = await this.execute(args, options.timeoutMs ?? this.timeoutMs);
        return parseYtDlpOutput(output);
    }

    buildArgs(url: string, options: ExtractOptions): string[] {
        const args = ['--dump-json', '--no-playlist', '--no-warnings', '--geo-bypass'];

        if (options.outputTemplate) {
            args.push('--no-simulate', '--no-mtime', '-o', options.outputTemplate);
        }
        if (options.format) {
            args.push('-f', options.format);
        }
        if (options.userAgent) {
            args.push('--user-agent', options.userAgent);
        }
        for (const [name, value] of Object.entries(options.headers ?? {})) {
            args.push('--add-header', `${name}:${value}`);
        }
        if (options.extractorArgs) {
            args.push('--extractor-args', options.extractorArgs);
        }

        args.push(url);
        return args;
    }

    /**
     * Execute yt-dlp and resolve with its stdout
     */
    private execute(args: string[], timeoutMs: number): Promise<string> {
        return new Promise((resolve, reject) => {
            // Chunks are decoded together so split multi-byte characters survive
            const output: Buffer[] = [];
            const errorOutput: Buffer[] = [];
            let settled = false;

            const proc = spawn(this.binary, args, {
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            const finish = (error: Error | null): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (error) {
                    reject(error);
                } else {
                    resolve(Buffer.concat(output).toString('utf8'));
                }
            };

            const timer = setTimeout(() => {
                proc.kill('SIGKILL');
                finish(new ExtractionEngineError(`yt-dlp timed out after ${Math.round(timeoutMs / 1000)}s`, null));
            }, timeoutMs);

            proc.stdout.on('data', (data: Buffer) => {
                output.push(data);
            });

            proc.stderr.on('data', (data: Buffer) => {
                errorOutput.push(data);
            });

            proc.on('close', (code: number | null) => {
                if (code === 0) {
                    finish(null);
                } else {
                    const stderr = Buffer.concat(errorOutput).toString('utf8').trim();
                    finish(new ExtractionEngineError(stderr || `yt-dlp exited with code ${code}`, code));
                }
            });

            proc.on('error', (error: Error) => finish(new ExtractionEngineError(error.message, null)));
        });
    }
}

/**
 * Parse the first info JSON object yt-dlp printed
 */
export function parseYtDlpOutput(output: string): ExtractionMetadata {
    const line = output
        .split('\n')
        .map((l) => l.trim())
        .find((l) => l.startsWith('{'));
    if (!line) {
        throw new ExtractionEngineError('yt-dlp returned no metadata', 0);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch {
        throw new ExtractionEngineError('yt-dlp returned malformed metadata', 0);
    }

    const parsed = YtDlpInfoSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ExtractionEngineError(`Unexpected yt-dlp metadata: ${parsed.error.issues[0]?.message}`, 0);
    }

    const info = parsed.data;
    return {
        title: info.title ?? undefined,
        description: info.description ?? undefined,
        duration: info.duration ?? undefined,
        uploader: info.uploader ?? undefined,
        tags: info.tags ?? undefined,
        width: info.width ?? undefined,
        height: info.height ?? undefined,
        ext: info.ext ?? undefined,
        webpageUrl: info.webpage_url ?? undefined,
        formats: info.formats?.map((f) => ({
            formatId: f.format_id,
            ext: f.ext ?? undefined,
            width: f.width ?? undefined,
            height: f.height ?? undefined,
            vcodec: f.vcodec ?? undefined,
            acodec: f.acodec ?? undefined,
        })),
    };
}
