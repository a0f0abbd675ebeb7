import { createHash } from 'node:crypto'

export { hashClientToken, resolveClientKey }

type HeaderReader = {
  header: (name: string) => string | undefined
}

const hashClientToken = (token: string): string => {
  return createHash('sha256').update(token).digest('hex')
}

// Rate-limit identity: hashed client token, else the first forwarded address.
const resolveClientKey = (reader: HeaderReader): string => {
  const token = reader.header('x-client-token')?.trim()
  if (token) return hashClientToken(token)

  const forwarded = reader.header('x-forwarded-for')?.split(',')[0]?.trim()
  if (forwarded) return forwarded

  return 'anonymous'
}
