import { afterEach, describe, it, expect, vi } from 'vitest'
import { buildCatalog, getRecipe, listRecipes } from '@application/catalog/buildCatalog.ts'
import { NotFoundError, ValidationError } from '@domain/errors.ts'

afterEach(() => {
  vi.restoreAllMocks()
})

const pancakes = { id: 'pancakes', name: 'Pancakes', ingredients: [{ name: 'flour', qty: 1 }] }
const omelette = { id: 'omelette', name: 'Omelette', ingredients: [{ name: 'eggs', qty: 3 }] }
const broken = { id: 'broken', name: 'Broken', ingredients: [{ name: 'sugar', qty: -2, unit: 'g' }] }

describe('buildCatalog', () => {
  it('keeps valid recipes and reports rejected ones', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const { catalog, rejections } = buildCatalog({
      version: 'v1',
      recipes: [pancakes, broken, omelette, { ...pancakes, name: 'Other Pancakes' }],
      substitutions: [{ target: 'stove', context: 'tool', alternatives: [{ name: 'oven', score: 0.7 }] }],
    })

    expect(catalog.version).toBe('v1')
    expect([...catalog.recipes.keys()]).toEqual(['pancakes', 'omelette'])
    expect(catalog.substitutions.get('tool:stove')?.alternatives).toEqual([{ name: 'oven', score: 0.7 }])

    expect(rejections).toHaveLength(2)
    expect(rejections[0]).toBeInstanceOf(ValidationError)
    expect(rejections[0].recipeId).toBe('broken')
    expect(rejections[1].issues).toEqual(['duplicate recipe id'])
    expect(warn).toHaveBeenCalledTimes(2)
    expect(warn).toHaveBeenCalledWith(
      '[Larder] catalog v1: Recipe "broken" is invalid: ingredient "sugar": quantity must be positive when a unit is given',
    )
  })

  it('rejects a second rule for the same target', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const rule = { target: 'milk', alternatives: [{ name: 'oat milk', score: 0.8 }] }

    const { catalog, rejections } = buildCatalog({ version: 'v1', recipes: [], substitutions: [rule, rule] })

    expect(catalog.substitutions.size).toBe(1)
    expect(rejections.map((r) => r.issues)).toEqual([['duplicate rule for ingredient "milk"']])
  })

  it('freezes recipes', () => {
    const { catalog } = buildCatalog({ version: 'v1', recipes: [pancakes] })
    const recipe = getRecipe(catalog, 'pancakes')

    expect(Object.isFrozen(recipe)).toBe(true)
    expect(Object.isFrozen(recipe.ingredients[0])).toBe(true)
    expect(Object.isFrozen(catalog)).toBe(true)
  })
})

describe('catalog lookups', () => {
  const { catalog } = buildCatalog({ version: 'v1', recipes: [pancakes, omelette] })

  it('enumerates by ascending id', () => {
    expect(listRecipes(catalog).map((r) => r.id)).toEqual(['omelette', 'pancakes'])
  })

  it('throws NotFoundError for unknown ids', () => {
    expect(() => getRecipe(catalog, 'waffles')).toThrow(NotFoundError)
    expect(() => getRecipe(catalog, 'waffles')).toThrow('No recipe with id "waffles"')
  })
})
