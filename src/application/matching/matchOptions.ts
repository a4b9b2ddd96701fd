import { DEFAULT_HINT_SCORING, type HintScoring } from '@application/substitution/resolveSubstitutions.ts'

export interface MatchOptions extends HintScoring {
  /** How many reports `recommendRecipes` returns in total. */
  recommendLimit: number
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  ...DEFAULT_HINT_SCORING,
  recommendLimit: 5,
}

export function resolveMatchOptions(options: Partial<MatchOptions> = {}): MatchOptions {
  return { ...DEFAULT_MATCH_OPTIONS, ...options }
}
