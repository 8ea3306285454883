import { promises as fs } from 'node:fs'
import path from 'node:path'
import { ulid } from 'ulid'
import type { ImageStoragePort, UploadedImage } from '@scrivener/blog-core'

export interface StorageConfig {
  uploadDir: string
  baseUrl: string
  maxImageSize: number
}

export interface StoredFile {
  path: string
  mimeType: string
}

const IMAGE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
}

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
}

const IMAGE_SUBDIR = 'posts'

/**
 * Local-disk storage for post images. Files are named by ULID and
 * served back under `baseUrl`.
 */
export class FileStorage implements ImageStoragePort {
  private config: StorageConfig

  constructor(config?: Partial<StorageConfig>) {
    this.config = {
      uploadDir: config?.uploadDir || './data/uploads',
      baseUrl: config?.baseUrl || '/uploads',
      maxImageSize: config?.maxImageSize || 5 * 1024 * 1024, // 5MB
    }
  }

  async initialize(): Promise<void> {
    await fs.mkdir(path.join(this.config.uploadDir, IMAGE_SUBDIR), { recursive: true })
  }

  validateImage(file: UploadedImage): { valid: boolean; error?: string } {
    if (!IMAGE_EXTENSIONS[file.type]) {
      return {
        valid: false,
        error: 'Upload a valid image. The file you uploaded was either not an image or a corrupted image.',
      }
    }

    if (file.size > this.config.maxImageSize) {
      return {
        valid: false,
        error: `File size exceeds maximum allowed size of ${this.config.maxImageSize / 1024 / 1024}MB`,
      }
    }

    return { valid: true }
  }

  async saveImage(file: UploadedImage): Promise<{ url: string }> {
    const ext = IMAGE_EXTENSIONS[file.type] ?? path.extname(file.name).toLowerCase()
    const filename = `${ulid()}${ext}`
    const dir = path.join(this.config.uploadDir, IMAGE_SUBDIR)

    await fs.mkdir(dir, { recursive: true })
    await fs.writeFile(path.join(dir, filename), Buffer.from(await file.arrayBuffer()))

    return { url: `${this.config.baseUrl}/${IMAGE_SUBDIR}/${filename}` }
  }

  async deleteImage(url: string): Promise<void> {
    const filePath = this.resolveUrl(url)
    if (!filePath) return

    try {
      await fs.unlink(filePath)
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error
      }
    }
  }

  /**
   * Locate the stored file behind a public URL, or null when the URL
   * does not point inside the upload directory
   */
  async getFile(url: string): Promise<StoredFile | null> {
    const filePath = this.resolveUrl(url)
    if (!filePath) return null

    try {
      const stats = await fs.stat(filePath)
      if (!stats.isFile()) return null
    } catch (error) {
      if (isMissingFile(error)) return null
      throw error
    }

    return { path: filePath, mimeType: this.getMimeType(filePath) }
  }

  getMimeType(filename: string): string {
    return MIME_TYPES[path.extname(filename).toLowerCase()] || 'application/octet-stream'
  }

  private resolveUrl(url: string): string | null {
    const prefix = `${this.config.baseUrl}/`
    if (!url.startsWith(prefix)) return null

    let relative: string
    try {
      relative = decodeURIComponent(url.slice(prefix.length))
    } catch (error) {
      if (error instanceof URIError) return null
      throw error
    }

    const root = path.resolve(this.config.uploadDir)
    const filePath = path.resolve(root, relative)
    return filePath.startsWith(root + path.sep) ? filePath : null
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
