import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3'

/**
 * Durable blob storage for listing photos.
 * `put` resolves to the object's public URL or throws.
 */
export interface AssetStore {
  put(key: string, bytes: Buffer, contentType: string): Promise<string>
}

export interface S3AssetStoreOptions {
  bucket: string
  region: string
  /** CDN or custom domain; defaults to the bucket's virtual-hosted URL */
  publicBaseUrl?: string
  client?: S3Client
}

const CACHE_CONTROL = 'public, max-age=31536000'

export class S3AssetStore implements AssetStore {
  private readonly client: S3Client
  private readonly bucket: string
  private readonly region: string
  private readonly publicBaseUrl?: string

  constructor(options: S3AssetStoreOptions) {
    this.bucket = options.bucket
    this.region = options.region
    this.publicBaseUrl = options.publicBaseUrl?.replace(/\/+$/, '')
    this.client = options.client ?? new S3Client({ region: options.region })
  }

  publicUrl(key: string): string {
    if (this.publicBaseUrl) return `${this.publicBaseUrl}/${key}`
    return `https://${this.bucket}.s3.${this.region}.amazonaws.com/${key}`
  }

  async put(key: string, bytes: Buffer, contentType: string): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
        CacheControl: CACHE_CONTROL,
      })
    )
    return this.publicUrl(key)
  }

  destroy(): void {
    this.client.destroy()
  }
}
