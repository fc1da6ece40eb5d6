/**
 * Streams remote files to disk.
 *
 * @module transport/downloader
 */

import { createWriteStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { request } from 'undici';
import type { Dispatcher } from 'undici';
import { ApplicationRejectedError, TransientError, redactUrlCredentials, toDatasetError } from '../errors/index.js';

export interface FileDownloader {
  /**
   * Downloads `url` to `destination`, replacing any existing file.
   * @returns Number of bytes written
   */
  download(url: string, destination: string): Promise<number>;
}

export interface UndiciDownloaderOptions {
  timeoutMs: number;
  maxRedirections?: number;
}

export class UndiciFileDownloader implements FileDownloader {
  constructor(private readonly options: UndiciDownloaderOptions) {}

  async download(url: string, destination: string): Promise<number> {
    const safeUrl = redactUrlCredentials(url);
    const operation = `download ${safeUrl}`;

    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: 'GET',
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        maxRedirections: this.options.maxRedirections ?? 5,
      });
    } catch (error) {
      throw toDatasetError(error, operation);
    }

    if (response.statusCode >= 400) {
      await response.body.dump();
      const message = `Download of ${safeUrl} failed with status ${response.statusCode}`;
      // Object stores answer 5xx under load; those are worth another attempt.
      if (response.statusCode >= 500 || response.statusCode === 429) {
        throw new TransientError('io', message, { operation, statusCode: response.statusCode });
      }
      throw new ApplicationRejectedError(message, response.statusCode, { operation });
    }

    try {
      await pipeline(response.body, createWriteStream(destination));
      return (await stat(destination)).size;
    } catch (error) {
      throw toDatasetError(error, operation);
    }
  }
}
