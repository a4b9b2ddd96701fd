import type { Recipe } from '@domain/models/Recipe.ts'
import {
  ruleKey,
  type Alternative,
  type SubstitutionContext,
  type SubstitutionTable,
} from '@domain/models/Substitution.ts'

export interface HintScoring {
  hintBaseScore: number
  hintScoreStep: number
  hintMinScore: number
}

export const DEFAULT_HINT_SCORING: HintScoring = {
  hintBaseScore: 0.9,
  hintScoreStep: 0.1,
  hintMinScore: 0.1,
}

/** Score of the alternative at `rank` (0-based) in an author-declared hint. */
export function hintScore(rank: number, scoring: HintScoring = DEFAULT_HINT_SCORING): number {
  const score = scoring.hintBaseScore - rank * scoring.hintScoreStep
  return Math.round(Math.max(scoring.hintMinScore, score) * 1000) / 1000
}

/**
 * Ranked alternatives for a recipe requirement.
 *
 * The recipe's own hints come first in declared order, then global rules
 * not already listed. The target itself and anything in `exclusions` are
 * never returned. No rule means an empty list, not an error.
 */
export function resolveSubstitutions(
  target: string,
  context: SubstitutionContext,
  recipe: Recipe | null,
  rules: SubstitutionTable,
  exclusions: readonly string[] = [],
  scoring: HintScoring = DEFAULT_HINT_SCORING,
): Alternative[] {
  const seen = new Set<string>([target])
  const result: Alternative[] = []

  const push = (alt: Alternative) => {
    if (seen.has(alt.name)) return
    seen.add(alt.name)
    result.push(alt)
  }

  const hint = recipe?.substitutions.find((h) => h.for === target && h.context === context)
  hint?.alternatives.forEach((name, rank) => push({ name, score: hintScore(rank, scoring) }))

  const global = rules.get(ruleKey(context, target))
  global?.alternatives.forEach(push)

  return result.filter((alt) => !exclusions.includes(alt.name))
}

/**
 * Highest-scoring alternative the user can actually use. Ties keep list
 * order, so recipe hints win over equally scored global rules.
 */
export function bestAvailable(
  alternatives: Alternative[],
  isAvailable: (name: string) => boolean,
): Alternative | null {
  let best: Alternative | null = null
  for (const alt of alternatives) {
    if (!isAvailable(alt.name)) continue
    if (!best || alt.score > best.score) best = alt
  }
  return best
}
