export type LetterGrade = 'A' | 'B' | 'C' | 'D' | 'F'

const SCALE: ReadonlyArray<[number, LetterGrade]> = [
  [90, 'A'],
  [80, 'B'],
  [70, 'C'],
  [60, 'D'],
]

/** Letter for a 0..100 score */
export function letterGrade(score: number): LetterGrade {
  for (const [min, letter] of SCALE) {
    if (score >= min) return letter
  }
  return 'F'
}

/**
 * Mean of the scores that are present, rounded to 2 decimals.
 * Null when no score is present.
 */
export function averageScore(scores: ReadonlyArray<number | null | undefined>): number | null {
  const present = scores.filter((s): s is number => typeof s === 'number')
  if (present.length === 0) return null
  const mean = present.reduce((sum, s) => sum + s, 0) / present.length
  return Math.round(mean * 100) / 100
}
