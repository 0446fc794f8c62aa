import * as fuzz from 'fuzzball'

/**
 * token_set_ratio がもっとも高い候補を返す。同点なら先に来た方。
 * どの候補ともスコアが 0 なら undefined。
 */
export function closestMatch<T>(
  query: string,
  candidates: readonly T[],
  labels: (candidate: T) => readonly string[],
): T | undefined {
  let best: T | undefined
  let bestScore = 0
  for (const candidate of candidates) {
    for (const label of labels(candidate)) {
      const score = fuzz.token_set_ratio(query, label)
      if (score > bestScore) {
        best = candidate
        bestScore = score
      }
    }
  }
  return best
}
