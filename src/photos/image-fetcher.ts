/**
 * HTTP transport for header images
 */

import axios from 'axios';

export interface ImageResponse {
  status: number;
  body: Buffer;
}

export interface ImageFetcher {
  /** Throws InvalidImageUrlError when the URL cannot be requested at all */
  get(url: string): Promise<ImageResponse>;
}

export class InvalidImageUrlError extends Error {
  constructor(readonly url: string, reason: string) {
    super(`Invalid image URL "${url}": ${reason}`);
    this.name = 'InvalidImageUrlError';
  }
}

/**
 * Parse an image URL, accepting only absolute http(s) addresses
 */
export function parseImageUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidImageUrlError(url, 'not an absolute URL');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidImageUrlError(url, `unsupported protocol ${parsed.protocol}`);
  }
  if (!parsed.hostname) {
    throw new InvalidImageUrlError(url, 'missing host');
  }

  return parsed;
}

export interface HttpImageFetcherOptions {
  timeout: number;
  userAgent: string;
}

export class HttpImageFetcher implements ImageFetcher {
  constructor(private readonly options: HttpImageFetcherOptions) {}

  async get(url: string): Promise<ImageResponse> {
    const target = parseImageUrl(url);

    const response = await axios.get<ArrayBuffer>(target.toString(), {
      responseType: 'arraybuffer',
      timeout: this.options.timeout,
      headers: { 'User-Agent': this.options.userAgent },
      // Status handling belongs to the caller
      validateStatus: () => true,
    });

    return { status: response.status, body: Buffer.from(response.data) };
  }
}
