import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { contentVersion } from '../src/services/cache/fingerprint.js'
import { StorageService } from '../src/services/storage.service.js'

describe('StorageService', () => {
  let root = ''

  beforeEach(async () => {
    vi.stubEnv('STORAGE_BUCKET', '')
    root = await mkdtemp(path.join(os.tmpdir(), 'competitor-files-'))
    await mkdir(path.join(root, 'Comps'))
    await writeFile(path.join(root, 'Comps', 'peers.csv'), 'Company\nAcme\n')
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await rm(root, { recursive: true, force: true })
  })

  it('reads library paths from the local root', async () => {
    const service = new StorageService({ localRoot: root })
    const reference = 'https://example.sharepoint.com/sites/deal/Shared Documents/Comps/peers.csv'

    const resolution = await service.resolve(reference)

    expect(resolution.ok).toBe(true)
    if (!resolution.ok) return
    expect(resolution.file.id).toBe(reference)
    expect(resolution.file.displayName).toBe('Comps/peers.csv')
    expect(resolution.file.content.toString('utf8')).toBe('Company\nAcme\n')
    expect(resolution.file.version).toBe(contentVersion(Buffer.from('Company\nAcme\n')))
  })

  it('reports missing files as a resolution failure', async () => {
    const service = new StorageService({ localRoot: root })

    const resolution = await service.resolve('Comps/missing.csv')

    expect(resolution.ok).toBe(false)
    if (resolution.ok) return
    expect(resolution.reference).toBe('Comps/missing.csv')
    expect(resolution.reason).toMatch(/^file not found: Comps\/missing\.csv/)
  })

  it('refuses paths that climb out of the root', async () => {
    const service = new StorageService({ localRoot: root })

    const resolution = await service.resolve('../outside/peers.csv')

    expect(resolution).toMatchObject({ ok: false, reason: 'unsafe storage path' })
  })

  it('rejects gs paths without an object name', async () => {
    const service = new StorageService({ localRoot: root })

    const resolution = await service.resolve('gs://deal-files')

    expect(resolution).toMatchObject({ ok: false, reason: 'invalid gs path' })
  })
})
