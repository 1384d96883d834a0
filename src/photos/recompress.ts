/**
 * JPEG recompression for header photos
 */

import sharp from 'sharp';

const BACKGROUND = '#ffffff';

/**
 * Decode any supported image, drop transparency onto a solid background and
 * re-encode it as a JPEG at the given quality (1-100)
 */
export async function recompressToJpeg(input: Buffer, quality: number): Promise<Buffer> {
  return sharp(input)
    .flatten({ background: BACKGROUND })
    .jpeg({ quality, optimiseCoding: true })
    .toBuffer();
}
