import { describe, it, expect } from 'vitest'
import {
  bestAvailable,
  hintScore,
  resolveSubstitutions,
} from '@application/substitution/resolveSubstitutions.ts'
import { indexRules } from '@application/catalog/buildCatalog.ts'
import { makeRecipe } from '../factories.ts'

const rules = indexRules([
  {
    target: 'milk',
    context: 'ingredient',
    alternatives: [
      { name: 'oat milk', score: 0.85 },
      { name: 'milk', score: 0.8 },
      { name: 'rice milk', score: 0.6 },
    ],
  },
  { target: 'stove', context: 'tool', alternatives: [{ name: 'hot plate', score: 0.9 }] },
])

const recipe = makeRecipe({
  ingredients: [{ name: 'milk', qty: 1, unit: 'cup' }],
  substitutions: [{ for: 'milk', alternatives: ['Oat Milk', 'soy milk', 'almond milk'] }],
})

describe('hintScore', () => {
  it('steps down by rank and stops at the floor', () => {
    expect(hintScore(0)).toBe(0.9)
    expect(hintScore(1)).toBe(0.8)
    expect(hintScore(2)).toBe(0.7)
    expect(hintScore(20)).toBe(0.1)
  })

  it('follows custom scoring', () => {
    expect(hintScore(1, { hintBaseScore: 1, hintScoreStep: 0.25, hintMinScore: 0 })).toBe(0.75)
  })
})

describe('resolveSubstitutions', () => {
  it('puts recipe hints first, then unseen global alternatives', () => {
    expect(resolveSubstitutions('milk', 'ingredient', recipe, rules)).toEqual([
      { name: 'oat milk', score: 0.9 },
      { name: 'soy milk', score: 0.8 },
      { name: 'almond milk', score: 0.7 },
      { name: 'rice milk', score: 0.6 },
    ])
  })

  it('never returns the target or an excluded ingredient', () => {
    const names = resolveSubstitutions('milk', 'ingredient', recipe, rules, ['soy milk']).map((a) => a.name)
    expect(names).toEqual(['oat milk', 'almond milk', 'rice milk'])
  })

  it('uses global rules alone when there is no recipe', () => {
    expect(resolveSubstitutions('milk', 'ingredient', null, rules)).toEqual([
      { name: 'oat milk', score: 0.85 },
      { name: 'rice milk', score: 0.6 },
    ])
  })

  it('keeps tool and ingredient rules apart', () => {
    expect(resolveSubstitutions('stove', 'tool', null, rules)).toEqual([{ name: 'hot plate', score: 0.9 }])
    expect(resolveSubstitutions('stove', 'ingredient', null, rules)).toEqual([])
  })

  it('returns an empty list when nothing is known', () => {
    expect(resolveSubstitutions('saffron', 'ingredient', recipe, rules)).toEqual([])
  })
})

describe('bestAvailable', () => {
  const alternatives = [
    { name: 'a', score: 0.5 },
    { name: 'b', score: 0.9 },
    { name: 'c', score: 0.9 },
  ]

  it('picks the highest score, first one on ties', () => {
    expect(bestAvailable(alternatives, () => true)).toEqual({ name: 'b', score: 0.9 })
  })

  it('skips what the user does not have', () => {
    expect(bestAvailable(alternatives, (name) => name !== 'b')).toEqual({ name: 'c', score: 0.9 })
    expect(bestAvailable(alternatives, () => false)).toBeNull()
  })
})
