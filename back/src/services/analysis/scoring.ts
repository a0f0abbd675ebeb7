import type { ClassifiedCompany } from '../../domain/types.js'

export { bucketByScore }
export type { ScoredCandidate, ScoreBuckets }

type ScoredCandidate = ClassifiedCompany & {
  order: number
}

type ScoreBuckets = {
  verified: ClassifiedCompany[]
  toCrosscheck: ClassifiedCompany[]
}

const bucketByScore = (scored: ScoredCandidate[], threshold: number): ScoreBuckets => {
  const ranked = [...scored].sort(
    (left, right) => right.score - left.score || left.order - right.order
  )
  const strip = ({ name, score, reason }: ScoredCandidate): ClassifiedCompany => ({
    name,
    score,
    reason
  })

  return {
    verified: ranked.filter((item) => item.score >= threshold).map(strip),
    toCrosscheck: ranked.filter((item) => item.score < threshold).map(strip)
  }
}
