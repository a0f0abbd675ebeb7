import { randomUUID } from 'node:crypto'

export { makeId }

type IdPrefix = 'req'

const makeId = (prefix: IdPrefix): string => `${prefix}_${randomUUID()}`
