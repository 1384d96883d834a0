/**
 * Header photo enrichment
 *
 * Downloads the record's header photo and stores a recompressed base64 copy.
 * Never fails the record: every problem ends as "no photo".
 */

import { logger } from '../utils/logger.js';
import { describeError } from '../utils/attempt.js';
import { recompressToJpeg } from './recompress.js';
import { InvalidImageUrlError } from './image-fetcher.js';
import type { ImageFetcher } from './image-fetcher.js';
import type { ArticleRecord, RecordStage } from '../types/index.js';

const log = logger.child({ component: 'photos' });

export const DEFAULT_IMAGE_QUALITY = 35;

export interface PhotoProcessorOptions {
  quality?: number;
}

export class PhotoProcessor implements RecordStage {
  readonly name = 'photo';
  readonly order = 100;
  private readonly quality: number;

  constructor(
    private readonly fetcher: ImageFetcher,
    options: PhotoProcessorOptions = {}
  ) {
    this.quality = options.quality ?? DEFAULT_IMAGE_QUALITY;
  }

  process(record: ArticleRecord): Promise<ArticleRecord> {
    return this.postProcessPhoto(record);
  }

  async postProcessPhoto(record: ArticleRecord): Promise<ArticleRecord> {
    const url = record.headerPhotoUrl;
    if (!url) {
      return { ...record, headerPhotoEncoded: null };
    }

    try {
      const response = await this.fetcher.get(url);

      if (response.status < 200 || response.status >= 300) {
        log.debug({ url, status: response.status }, 'Header photo not available');
        return { ...record, headerPhotoEncoded: null };
      }

      const jpeg = await recompressToJpeg(response.body, this.quality);
      log.debug(
        { url, originalBytes: response.body.length, compressedBytes: jpeg.length },
        'Header photo recompressed'
      );
      return { ...record, headerPhotoEncoded: jpeg.toString('base64') };
    } catch (error) {
      if (error instanceof InvalidImageUrlError) {
        log.warn({ url, sourceUrl: record.sourceUrl }, 'Discarding malformed header photo URL');
        return { ...record, headerPhotoUrl: null, headerPhotoEncoded: null };
      }

      log.warn(
        { url, sourceUrl: record.sourceUrl, error: describeError(error) },
        'Header photo processing failed'
      );
      return { ...record, headerPhotoEncoded: null };
    }
  }
}
