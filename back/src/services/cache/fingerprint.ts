import { createHash } from 'node:crypto'
import { collapseWhitespace } from '../extract/normalize.js'

export { computeFingerprint, contentVersion }
export type { FingerprintFile }

type FingerprintFile = {
  id: string
  version: string
}

const contentVersion = (content: Buffer): string =>
  createHash('sha256').update(content).digest('hex')

/**
 * Stable cache key for a target company and a set of file versions. File
 * order and duplicates do not change the key; a changed version does.
 */
const computeFingerprint = (targetCompany: string, files: FingerprintFile[]): string => {
  const target = collapseWhitespace(targetCompany).toLowerCase()
  const versions = new Map<string, string>()
  for (const file of files) {
    if (!versions.has(file.id)) {
      versions.set(file.id, file.version)
    }
  }
  const entries = [...versions.entries()]
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([id, version]) => [id, version])

  const digest = createHash('sha256')
    .update(JSON.stringify({ target, files: entries }))
    .digest('hex')
  const slug = target.replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'company'

  return `${slug}_${digest.slice(0, 16)}`
}
