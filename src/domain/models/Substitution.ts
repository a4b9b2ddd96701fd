export type SubstitutionContext = 'ingredient' | 'tool'

export interface Alternative {
  name: string
  score: number               // 1 = perfect swap
}

/** Catalog-wide fallback: target -> ranked alternatives. */
export interface SubstitutionRule {
  target: string
  context: SubstitutionContext
  alternatives: Alternative[]
}

/** Global rules indexed by `context:target`. Build with `indexRules`. */
export type SubstitutionTable = ReadonlyMap<string, SubstitutionRule>

export function ruleKey(context: SubstitutionContext, target: string): string {
  return `${context}:${target}`
}
