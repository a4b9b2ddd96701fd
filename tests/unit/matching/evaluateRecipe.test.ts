import { describe, it, expect } from 'vitest'
import { evaluateRecipe } from '@application/matching/evaluateRecipe.ts'
import { indexRules } from '@application/catalog/buildCatalog.ts'
import { makeInventory, makeRecipe } from '../factories.ts'

const stoveToOven = indexRules([
  { target: 'stove', context: 'tool', alternatives: [{ name: 'oven', score: 0.7 }] },
])

const pancakes = makeRecipe({
  id: 'pancakes',
  name: 'Pancakes',
  ingredients: [
    { name: 'flour', qty: 1 },
    { name: 'milk', qty: 1 },
  ],
  tools: ['stove'],
})

describe('evaluateRecipe', () => {
  describe('pantry scenarios', () => {
    it('is Missing when an ingredient has no way in, even if tools can be substituted', () => {
      const inventory = makeInventory({ ingredients: 'flour', tools: 'oven' })

      const report = evaluateRecipe(inventory, pancakes, stoveToOven)

      expect(report.toolCompatibility).toBe('substitution')
      expect(report.toolCompatible).toBe(true)
      expect(report.tools).toEqual([{ tool: 'stove', owned: false, substitute: { name: 'oven', score: 0.7 } }])
      expect(report.ingredients.map((i) => [i.ingredient, i.resolution])).toEqual([
        ['flour', 'none'],
        ['milk', 'unresolved'],
      ])
      expect(report.ingredients[1].shortfall).toBe(1)
      expect(report.status).toBe('Missing')
      expect(report.score).toBe(0.2)
    })

    it('is ReadyWithSubstitution once every ingredient is present', () => {
      const inventory = makeInventory({ ingredients: 'flour, milk', tools: 'oven' })

      const report = evaluateRecipe(inventory, pancakes, stoveToOven)

      expect(report.status).toBe('ReadyWithSubstitution')
      expect(report.score).toBe(0.85)
    })

    it('treats an excluded ingredient as unavailable', () => {
      const inventory = makeInventory({ ingredients: 'flour, milk', tools: 'stove', exclusions: 'flour' })

      const report = evaluateRecipe(inventory, pancakes, stoveToOven)

      expect(report.status).toBe('Missing')
      expect(report.ingredients[0]).toMatchObject({
        ingredient: 'flour',
        excluded: true,
        resolution: 'unresolved',
        shortfall: 1,
      })
    })
  })

  it('is Ready with score 1 for a recipe needing nothing', () => {
    const report = evaluateRecipe(makeInventory(), makeRecipe())

    expect(report).toMatchObject({ status: 'Ready', score: 1, toolCompatibility: 'direct', warnings: [] })
  })

  it('is Missing when a tool has no usable substitute', () => {
    const recipe = makeRecipe({ tools: ['wok'] })

    const report = evaluateRecipe(makeInventory({ tools: 'knife' }), recipe)

    expect(report.toolCompatibility).toBe('incompatible')
    expect(report.toolCompatible).toBe(false)
    expect(report.status).toBe('Missing')
    expect(report.score).toBe(0.4)
  })

  it('uses the recipe tool hint when the user owns the alternative', () => {
    const recipe = makeRecipe({
      tools: ['wok'],
      substitutions: [{ for: 'wok', context: 'tool', alternatives: ['frying pan'] }],
    })

    const report = evaluateRecipe(makeInventory({ tools: 'frying pan' }), recipe)

    expect(report.status).toBe('ReadyWithSubstitution')
    expect(report.score).toBe(0.95)
  })

  describe('optional ingredients', () => {
    const recipe = makeRecipe({
      ingredients: [
        { name: 'oats', qty: 1, unit: 'cup' },
        { name: 'honey', qty: 1, unit: 'tbsp', optional: true },
      ],
    })

    it('skips an optional line that cannot be met', () => {
      const report = evaluateRecipe(makeInventory({ ingredients: 'oats' }), recipe)

      expect(report.ingredients[1].resolution).toBe('skipped')
      expect(report.status).toBe('Ready')
      expect(report.score).toBe(1)
    })

    it('substitutes an optional line without changing the status', () => {
      const rules = indexRules([
        { target: 'honey', context: 'ingredient', alternatives: [{ name: 'maple syrup', score: 0.8 }] },
      ])

      const report = evaluateRecipe(makeInventory({ ingredients: 'oats, maple syrup' }), recipe, rules)

      expect(report.ingredients[1]).toMatchObject({
        resolution: 'substitution',
        substitute: { name: 'maple syrup', score: 0.8 },
      })
      expect(report.status).toBe('Ready')
      expect(report.score).toBe(1)
    })

    it('keeps optional substitutes out of the score', () => {
      const withButter = makeRecipe({
        ingredients: [
          { name: 'butter', qty: 1, unit: 'tbsp' },
          { name: 'honey', qty: 1, unit: 'tbsp', optional: true },
        ],
      })
      const rules = indexRules([
        { target: 'butter', context: 'ingredient', alternatives: [{ name: 'margarine', score: 0.6 }] },
        { target: 'honey', context: 'ingredient', alternatives: [{ name: 'maple syrup', score: 1 }] },
      ])

      const report = evaluateRecipe(makeInventory({ ingredients: 'margarine, maple syrup' }), withButter, rules)

      expect(report.status).toBe('ReadyWithSubstitution')
      expect(report.score).toBe(0.8)
    })

    it('is Ready when every line is optional', () => {
      const garnish = makeRecipe({ ingredients: [{ name: 'parsley', optional: true }] })
      const rules = indexRules([
        { target: 'parsley', context: 'ingredient', alternatives: [{ name: 'cilantro', score: 0.6 }] },
      ])

      const report = evaluateRecipe(makeInventory({ ingredients: 'cilantro' }), garnish, rules)

      expect(report.ingredients[0].resolution).toBe('substitution')
      expect(report.status).toBe('Ready')
      expect(report.score).toBe(1)
    })
  })

  describe('exclusions', () => {
    it('uses a non-excluded substitute for an excluded ingredient on hand', () => {
      const recipe = makeRecipe({ ingredients: [{ name: 'butter', qty: 2, unit: 'tbsp' }] })
      const rules = indexRules([
        { target: 'butter', context: 'ingredient', alternatives: [{ name: 'olive oil', score: 0.7 }] },
      ])
      const inventory = makeInventory({ ingredients: ['4 tbsp butter', 'olive oil'], exclusions: 'butter' })

      const report = evaluateRecipe(inventory, recipe, rules)

      expect(report.ingredients[0]).toMatchObject({
        excluded: true,
        resolution: 'substitution',
        substitute: { name: 'olive oil', score: 0.7 },
      })
      expect(report.status).toBe('ReadyWithSubstitution')
      expect(report.score).toBe(0.85)
    })

    it('does not offer an excluded alternative', () => {
      const recipe = makeRecipe({ ingredients: [{ name: 'butter', qty: 2, unit: 'tbsp' }] })
      const rules = indexRules([
        { target: 'butter', context: 'ingredient', alternatives: [{ name: 'margarine', score: 0.9 }] },
      ])
      const inventory = makeInventory({ ingredients: 'margarine', exclusions: 'margarine' })

      expect(evaluateRecipe(inventory, recipe, rules).ingredients[0]).toMatchObject({
        resolution: 'unresolved',
        substitute: null,
      })
    })

    it('leaves a tool incompatible when its only owned alternative is excluded', () => {
      const recipe = makeRecipe({ tools: ['stove'] })

      const report = evaluateRecipe(makeInventory({ tools: 'oven', exclusions: 'oven' }), recipe, stoveToOven)

      expect(report.tools).toEqual([{ tool: 'stove', owned: false, substitute: null }])
      expect(report.toolCompatibility).toBe('incompatible')
      expect(report.status).toBe('Missing')
    })
  })

  describe('quantities', () => {
    it('converts pantry amounts into the recipe unit', () => {
      const recipe = makeRecipe({ ingredients: [{ name: 'milk', qty: 1, unit: 'cup' }] })

      const report = evaluateRecipe(makeInventory({ ingredients: ['16 tbsp milk'] }), recipe)

      expect(report.ingredients[0]).toMatchObject({ availableQty: 1, resolution: 'none' })
      expect(report.status).toBe('Ready')
    })

    it('reports the shortfall of an insufficient amount', () => {
      const recipe = makeRecipe({ ingredients: [{ name: 'milk', qty: 2, unit: 'cups' }] })

      const report = evaluateRecipe(makeInventory({ ingredients: ['1 cup milk'] }), recipe)

      expect(report.ingredients[0]).toMatchObject({ availableQty: 1, resolution: 'unresolved', shortfall: 1 })
      expect(report.status).toBe('Missing')
    })

    it('lets a substitution cover an insufficient amount', () => {
      const recipe = makeRecipe({ ingredients: [{ name: 'butter', qty: 4, unit: 'tbsp' }] })
      const rules = indexRules([
        { target: 'butter', context: 'ingredient', alternatives: [{ name: 'margarine', score: 0.9 }] },
      ])

      const report = evaluateRecipe(makeInventory({ ingredients: ['1 tbsp butter', 'margarine'] }), recipe, rules)

      expect(report.ingredients[0].substitute).toEqual({ name: 'margarine', score: 0.9 })
      expect(report.score).toBe(0.95)
    })

    it('flags units that cannot be compared instead of converting them', () => {
      const recipe = makeRecipe({ ingredients: [{ name: 'flour', qty: 200, unit: 'g' }] })

      const report = evaluateRecipe(makeInventory({ ingredients: ['2 cups flour'] }), recipe)

      expect(report.ingredients[0]).toMatchObject({ resolution: 'unresolved', shortfall: 200 })
      expect(report.warnings).toEqual([
        { kind: 'unit-incompatible', ingredient: 'flour', requiredUnit: 'gram', availableUnit: 'cup' },
      ])
    })

    it('accepts an unspecified pantry amount unless the line is strict', () => {
      const loose = makeRecipe({ ingredients: [{ name: 'chicken', qty: 1.5, unit: 'kg' }] })
      const strict = makeRecipe({ ingredients: [{ name: 'chicken', qty: 1.5, unit: 'kg', strict: true }] })
      const inventory = makeInventory({ ingredients: 'chicken' })

      expect(evaluateRecipe(inventory, loose).status).toBe('Ready')
      const report = evaluateRecipe(inventory, strict)
      expect(report.status).toBe('Missing')
      expect(report.ingredients[0].shortfall).toBe(1.5)
    })
  })

  it('scores a Missing recipe by how much of it is covered', () => {
    const recipe = makeRecipe({
      ingredients: [{ name: 'a' }, { name: 'bread' }, { name: 'cheese' }, { name: 'ham' }],
    })

    expect(evaluateRecipe(makeInventory({ ingredients: 'bread, cheese, ham' }), recipe).score).toBe(0.3)
    expect(evaluateRecipe(makeInventory({ ingredients: 'bread' }), recipe).score).toBe(0.1)
  })

  it('ranks substituted recipes between Missing and Ready', () => {
    const inventory = makeInventory({ ingredients: 'flour, milk', tools: 'oven' })
    const substituted = evaluateRecipe(inventory, pancakes, stoveToOven)
    const missing = evaluateRecipe(makeInventory({ tools: 'stove' }), pancakes, stoveToOven)

    expect(substituted.score).toBeGreaterThan(0.5)
    expect(substituted.score).toBeLessThan(1)
    expect(missing.score).toBeLessThan(0.5)
  })

  it('is deterministic', () => {
    const inventory = makeInventory({ ingredients: 'flour', tools: 'oven' })
    expect(evaluateRecipe(inventory, pancakes, stoveToOven)).toEqual(evaluateRecipe(inventory, pancakes, stoveToOven))
  })
})
