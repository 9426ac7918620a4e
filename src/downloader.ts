import https from 'https';
import http from 'http';
import { URL } from 'url';
import { logger } from './utils/logger.js';
import { FetchError } from './errors.js';
import { DownloadProgress, Fetcher } from './types.js';

const USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36';
const MAX_REDIRECTS = 5;

export interface DownloaderOptions {
  // seconds
  timeout: number;
  userAgent?: string;
}

/**
 * Streams a URL into memory over http/https, following redirects. The socket
 * timeout bounds both connecting and every idle gap while reading.
 */
export class Downloader implements Fetcher {
  constructor(private options: DownloaderOptions) {}

  async fetchBytes(url: string, onProgress?: (progress: DownloadProgress) => void): Promise<Buffer> {
    return this.request(url, 0, onProgress);
  }

  async fetchText(url: string): Promise<string> {
    const data = await this.request(url, 0);
    return data.toString('utf8');
  }

  private request(
    url: string,
    redirects: number,
    onProgress?: (progress: DownloadProgress) => void
  ): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      let parsedUrl: URL;
      try {
        parsedUrl = new URL(url);
      } catch {
        reject(new FetchError(`Invalid url: ${url}`, url));
        return;
      }
      const client = parsedUrl.protocol === 'https:' ? https : http;

      const request = client.get(url, {
        headers: {
          'User-Agent': this.options.userAgent ?? USER_AGENT
        },
        timeout: this.options.timeout * 1000
      }, (response) => {
        const status = response.statusCode ?? 0;

        if (status >= 300 && status < 400 && response.headers.location) {
          response.resume();
          if (redirects >= MAX_REDIRECTS) {
            reject(new FetchError(`Too many redirects: ${url}`, url, status));
            return;
          }
          const redirectUrl = new URL(response.headers.location, url).toString();
          logger.debug(`Redirect (${status}): ${url} -> ${redirectUrl}`);
          this.request(redirectUrl, redirects + 1, onProgress).then(resolve, reject);
          return;
        }

        if (status < 200 || status >= 300) {
          response.resume();
          reject(new FetchError(`Failed to download (${status}): ${url}`, url, status));
          return;
        }

        const length = Number(response.headers['content-length']);
        const total = Number.isFinite(length) && length > 0 ? length : undefined;
        const chunks: Buffer[] = [];
        let received = 0;

        response.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
          received += chunk.length;
          onProgress?.({ received, total });
        });

        response.on('end', () => {
          resolve(Buffer.concat(chunks));
        });

        response.on('error', (error) => {
          reject(new FetchError(`Download interrupted: ${url} - ${error.message}`, url, status));
        });
      });

      request.on('error', (error) => {
        reject(new FetchError(`Request failed: ${url} - ${error.message}`, url));
      });

      request.on('timeout', () => {
        request.destroy(new Error(`timed out after ${this.options.timeout}s`));
      });
    });
  }
}
