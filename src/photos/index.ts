export { PhotoProcessor, DEFAULT_IMAGE_QUALITY, type PhotoProcessorOptions } from './photo-processor.js';
export {
  HttpImageFetcher,
  InvalidImageUrlError,
  parseImageUrl,
  type ImageFetcher,
  type ImageResponse,
} from './image-fetcher.js';
export { recompressToJpeg } from './recompress.js';
