import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { Storage } from '@google-cloud/storage'
import type { FileResolution } from '../domain/types.js'
import { AppError, ErrorCodes, toErrorMessage } from '../utils/errors.js'
import { contentVersion } from './cache/fingerprint.js'
import { toDisplayName, toRelativePath } from './files/references.js'

export type FileResolver = {
  resolve: (reference: string) => Promise<FileResolution>
}

type StorageServiceOptions = {
  bucketName?: string
  localRoot?: string
  storage?: Storage
}

const DEFAULT_LOCAL_ROOT = '/tmp/competitor-analysis-files'

const assertSafeObjectPath = (objectPath: string): string => {
  const normalized = objectPath.replace(/\\/g, '/').replace(/^\/+/, '')
  if (!normalized || normalized.includes('\0')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'invalid storage path', 400, { objectPath })
  }

  const segments = normalized.split('/')
  if (segments.some((segment) => segment === '..')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
  }

  return normalized
}

const parseGsPath = (gsPath: string): { bucket: string; objectPath: string } => {
  const withoutScheme = gsPath.slice('gs://'.length)
  const firstSlash = withoutScheme.indexOf('/')
  if (firstSlash <= 0) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'invalid gs path', 400, { gsPath })
  }

  return {
    bucket: withoutScheme.slice(0, firstSlash),
    objectPath: assertSafeObjectPath(withoutScheme.slice(firstSlash + 1))
  }
}

/**
 * Resolves file references to bytes. `gs://bucket/object` references are read
 * from Cloud Storage; anything else is read from the configured bucket, or
 * from the local root when no bucket is configured.
 */
export class StorageService implements FileResolver {
  private readonly bucketName: string | undefined
  private readonly localRoot: string
  private storageClient: Storage | undefined

  constructor(options: StorageServiceOptions = {}) {
    this.bucketName = options.bucketName ?? process.env.STORAGE_BUCKET
    this.localRoot = options.localRoot ?? process.env.LOCAL_STORAGE_ROOT ?? DEFAULT_LOCAL_ROOT
    this.storageClient = options.storage
  }

  async resolve(reference: string): Promise<FileResolution> {
    const displayName = toDisplayName(reference)
    try {
      const content = await this.read(reference)
      return {
        ok: true,
        file: {
          id: reference,
          displayName,
          content,
          version: contentVersion(content)
        }
      }
    } catch (error) {
      console.warn(
        JSON.stringify({
          event: 'file_resolution_failed',
          reference,
          reason: toErrorMessage(error)
        })
      )
      return { ok: false, reference, displayName, reason: toErrorMessage(error) }
    }
  }

  private async read(reference: string): Promise<Buffer> {
    if (reference.startsWith('gs://')) {
      const { bucket, objectPath } = parseGsPath(reference)
      return this.readObject(bucket, objectPath)
    }

    const objectPath = assertSafeObjectPath(toRelativePath(reference))
    if (this.bucketName) {
      return this.readObject(this.bucketName, objectPath)
    }
    return this.readLocal(objectPath)
  }

  private async readObject(bucket: string, objectPath: string): Promise<Buffer> {
    const [content] = await this.storage().bucket(bucket).file(objectPath).download()
    return content
  }

  private async readLocal(objectPath: string): Promise<Buffer> {
    const targetPath = this.resolveLocalPath(objectPath)
    try {
      return await readFile(targetPath)
    } catch (error) {
      throw new Error(`file not found: ${objectPath} (${toErrorMessage(error)})`)
    }
  }

  private storage(): Storage {
    if (!this.storageClient) {
      const projectId = process.env.GCP_PROJECT_ID
      this.storageClient = new Storage(projectId ? { projectId } : {})
    }
    return this.storageClient
  }

  private resolveLocalPath(objectPath: string): string {
    const fullPath = path.resolve(this.localRoot, objectPath)
    const root = path.resolve(this.localRoot)
    if (!fullPath.startsWith(`${root}${path.sep}`) && fullPath !== root) {
      throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
    }
    return fullPath
  }
}
