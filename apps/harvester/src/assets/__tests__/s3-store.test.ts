import { beforeEach, describe, expect, it, vi } from 'vitest'

const { sendMock, destroyMock } = vi.hoisted(() => ({
  sendMock: vi.fn(),
  destroyMock: vi.fn(),
}))

vi.mock('@aws-sdk/client-s3', () => ({
  S3Client: class {
    send = sendMock
    destroy = destroyMock
  },
  PutObjectCommand: class {
    constructor(readonly input: unknown) {}
  },
}))

import { S3AssetStore } from '../s3-store.js'

describe('S3AssetStore', () => {
  beforeEach(() => {
    sendMock.mockReset()
    destroyMock.mockReset()
  })

  it('puts the object and returns its virtual-hosted url', async () => {
    sendMock.mockResolvedValue({})
    const store = new S3AssetStore({ bucket: 'test-bucket', region: 'eu-west-1' })
    const bytes = Buffer.from('jpeg')

    const url = await store.put('cars/7/image_1.jpg', bytes, 'image/jpeg')

    expect(url).toBe('https://test-bucket.s3.eu-west-1.amazonaws.com/cars/7/image_1.jpg')
    expect(sendMock).toHaveBeenCalledTimes(1)
    expect(sendMock.mock.calls[0][0].input).toEqual({
      Bucket: 'test-bucket',
      Key: 'cars/7/image_1.jpg',
      Body: bytes,
      ContentType: 'image/jpeg',
      CacheControl: 'public, max-age=31536000',
    })
  })

  it('uses the public base url when configured', async () => {
    sendMock.mockResolvedValue({})
    const store = new S3AssetStore({
      bucket: 'test-bucket',
      region: 'eu-west-1',
      publicBaseUrl: 'https://cdn.test/',
    })

    await expect(store.put('cars/7/image_2.jpg', Buffer.from('x'), 'image/jpeg')).resolves.toBe(
      'https://cdn.test/cars/7/image_2.jpg'
    )
  })

  it('propagates upload failures', async () => {
    sendMock.mockRejectedValue(new Error('AccessDenied'))
    const store = new S3AssetStore({ bucket: 'test-bucket', region: 'eu-west-1' })

    await expect(store.put('cars/7/image_1.jpg', Buffer.from('x'), 'image/jpeg')).rejects.toThrow('AccessDenied')
  })

  it('releases the client', () => {
    new S3AssetStore({ bucket: 'test-bucket', region: 'eu-west-1' }).destroy()

    expect(destroyMock).toHaveBeenCalledTimes(1)
  })
})
