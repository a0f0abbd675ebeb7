export const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim()

export const normalizeLabel = (text: string): string =>
  collapseWhitespace(text.toLowerCase().replace(/[_\-.]+/g, ' '))

export const fileExtension = (fileName: string): string => {
  const base = fileName.split('/').pop() ?? fileName
  const dot = base.lastIndexOf('.')
  return dot > 0 ? base.slice(dot).toLowerCase() : ''
}

export const stripExtension = (fileName: string): string => {
  const base = fileName.split('/').pop() ?? fileName
  const dot = base.lastIndexOf('.')
  return dot > 0 ? base.slice(0, dot) : base
}
