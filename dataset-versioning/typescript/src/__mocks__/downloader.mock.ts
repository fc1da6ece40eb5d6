import { writeFile } from 'node:fs/promises';
import type { FileDownloader } from '../transport/downloader.js';

/**
 * Serves fixed content per URL. Unknown URLs fail like a plain 404.
 */
export class MockFileDownloader implements FileDownloader {
  readonly requested: string[] = [];

  constructor(private readonly sources: Record<string, string | Error>) {}

  async download(url: string, destination: string): Promise<number> {
    this.requested.push(url);
    const source = this.sources[url];
    if (source === undefined) {
      throw new Error(`No mock content for ${url}`);
    }
    if (source instanceof Error) throw source;
    await writeFile(destination, source);
    return Buffer.byteLength(source);
  }
}
