import sharp from 'sharp'

export interface EncodedImage {
  bytes: Buffer
  contentType: string
}

export interface ImageEncoder {
  encode(bytes: Buffer): Promise<EncodedImage>
}

export interface SharpImageEncoderOptions {
  /** Longest side in pixels (default 1920) */
  maxDimension?: number
  /** JPEG quality 1-100 (default 85) */
  quality?: number
}

/**
 * Re-encodes photos as RGB JPEG bounded to maxDimension on both sides.
 * EXIF orientation is applied; transparency is flattened onto white.
 */
export class SharpImageEncoder implements ImageEncoder {
  readonly maxDimension: number
  readonly quality: number

  constructor(options: SharpImageEncoderOptions = {}) {
    this.maxDimension = options.maxDimension ?? 1920
    this.quality = options.quality ?? 85
  }

  async encode(bytes: Buffer): Promise<EncodedImage> {
    const output = await sharp(bytes)
      .rotate()
      .resize({
        width: this.maxDimension,
        height: this.maxDimension,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .flatten({ background: '#ffffff' })
      .jpeg({ quality: this.quality })
      .toBuffer()

    return { bytes: output, contentType: 'image/jpeg' }
  }
}
