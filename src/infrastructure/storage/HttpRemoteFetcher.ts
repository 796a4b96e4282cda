import axios from 'axios';
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import {
    extensionFromMime,
    mediaTypeFromExtension,
    mediaTypeFromMime,
} from '../../domain/entities/MediaAsset';
import { ResolutionError } from '../../domain/errors/CompositionErrors';
import { FetchedFile, IRemoteFetcher, RemoteFetchOptions } from '../../domain/ports/IRemoteFetcher';
import { RetryOptions, isRetryableHttpError, withRetry } from '../../lib/RetryUtils';

export interface HttpRemoteFetcherOptions {
    downloadDir: string;
    timeoutMs: number;
    retry?: RetryOptions;
}

/**
 * Downloads remote media over HTTP(S) into the download directory.
 *
 * Files are named after a hash of the URL, so a URL already downloaded by an
 * earlier submission is served from disk without a request.
 */
export class HttpRemoteFetcher implements IRemoteFetcher {
    private readonly downloadDir: string;
    private readonly timeoutMs: number;
    private readonly retry: RetryOptions;

    constructor(options: HttpRemoteFetcherOptions) {
        this.downloadDir = path.resolve(options.downloadDir);
        this.timeoutMs = options.timeoutMs;
        this.retry = options.retry ?? {};
    }

    async fetch(url: string, options: RemoteFetchOptions): Promise<FetchedFile> {
        const parsed = parseUrl(url);
        if (!isDomainAllowed(parsed.hostname, options.allowedDomains)) {
            throw new ResolutionError('DomainNotAllowed', `Domain ${parsed.hostname} is not allowed`, url);
        }

        await fs.promises.mkdir(this.downloadDir, { recursive: true });
        const baseName = `remote_${crypto.createHash('sha1').update(url).digest('hex')}`;

        const cached = await this.findCached(baseName);
        if (cached) {
            if (cached.sizeBytes > options.maxBytes) {
                throw new ResolutionError('SizeLimitExceeded', `${url} exceeds ${options.maxBytes} bytes`, url);
            }
            console.log(`[RemoteFetch] Reusing download of ${url}`);
            return cached;
        }

        try {
            return await withRetry(() => this.download(url, parsed, baseName, options.maxBytes), {
                maxAttempts: 3,
                initialBackoffMs: 500,
                ...this.retry,
                isRetryable: (error) => !(error instanceof ResolutionError) && isRetryableHttpError(error),
                onRetry: (attempt, error, delayMs) => {
                    console.warn(`[RemoteFetch] Attempt ${attempt} for ${url} failed, retrying in ${Math.round(delayMs)}ms`);
                },
            });
        } catch (error) {
            if (error instanceof ResolutionError) {
                throw error;
            }
            const reason = axios.isAxiosError(error)
                ? error.response ? `HTTP ${error.response.status}` : error.code ?? error.message
                : error instanceof Error ? error.message : String(error);
            throw new ResolutionError('UnreachableSource', `Failed to download ${url}: ${reason}`, url);
        }
    }

    private async download(url: string, parsed: URL, baseName: string, maxBytes: number): Promise<FetchedFile> {
        const response = await axios.get<Readable>(url, {
            responseType: 'stream',
            timeout: this.timeoutMs,
            maxRedirects: 5,
        });
        const body = response.data;

        const declaredLength = Number(headerValue(response.headers['content-length']));
        if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
            body.destroy();
            throw new ResolutionError(
                'SizeLimitExceeded',
                `${url} is ${declaredLength} bytes, limit is ${maxBytes}`,
                url
            );
        }

        const contentType = headerValue(response.headers['content-type']);
        const urlExtension = path.extname(parsed.pathname).substring(1).toLowerCase();
        const extension = mediaTypeFromExtension(parsed.pathname) ? urlExtension : extensionFromMime(contentType) ?? 'bin';
        const filePath = path.join(this.downloadDir, `${baseName}.${extension}`);
        const partPath = `${filePath}.part`;

        let received = 0;
        const limiter = new Transform({
            transform(chunk: Buffer, _encoding, callback) {
                received += chunk.length;
                if (received > maxBytes) {
                    callback(new ResolutionError('SizeLimitExceeded', `${url} exceeds ${maxBytes} bytes`, url));
                    return;
                }
                callback(null, chunk);
            },
        });

        try {
            await pipeline(body, limiter, fs.createWriteStream(partPath));
        } catch (error) {
            await fs.promises.rm(partPath, { force: true });
            throw error;
        }
        await fs.promises.rename(partPath, filePath);

        console.log(`[RemoteFetch] Downloaded ${url} (${received} bytes)`);
        return {
            path: filePath,
            sizeBytes: received,
            mediaType: mediaTypeFromMime(contentType) ?? mediaTypeFromExtension(filePath),
        };
    }

    private async findCached(baseName: string): Promise<FetchedFile | null> {
        const entries = await fs.promises.readdir(this.downloadDir);
        const fileName = entries.find((entry) => entry.startsWith(`${baseName}.`) && !entry.endsWith('.part'));
        if (!fileName) {
            return null;
        }
        const filePath = path.join(this.downloadDir, fileName);
        const stats = await fs.promises.stat(filePath);
        return { path: filePath, sizeBytes: stats.size, mediaType: mediaTypeFromExtension(fileName) };
    }
}

/**
 * An empty allow-list allows every host; otherwise the host must be a listed
 * domain or one of its subdomains.
 */
export function isDomainAllowed(hostname: string, allowedDomains: string[]): boolean {
    if (allowedDomains.length === 0) {
        return true;
    }
    const host = hostname.toLowerCase();
    return allowedDomains.some((domain) => {
        const allowed = domain.toLowerCase();
        return host === allowed || host.endsWith(`.${allowed}`);
    });
}

function parseUrl(url: string): URL {
    try {
        return new URL(url);
    } catch (error) {
        throw new ResolutionError('UnreachableSource', `Invalid URL: ${url}`, url);
    }
}

function headerValue(value: unknown): string | undefined {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number') {
        return String(value);
    }
    return undefined;
}
