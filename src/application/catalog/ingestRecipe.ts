import type { z } from 'zod'
import type { Recipe, SubstitutionHint } from '@domain/models/Recipe.ts'
import type { RecipeIngredient } from '@domain/models/Ingredient.ts'
import type { Alternative, SubstitutionRule } from '@domain/models/Substitution.ts'
import { unitFamily } from '@domain/constants/units.ts'
import { ValidationError } from '@domain/errors.ts'
import { canonicalUnit } from '@application/parser/parseUnit.ts'
import { normalizeIngredientName, normalizeToolName } from '@application/inventory/normalizeName.ts'
import { formatZodIssues } from '@application/validation/zodIssues.ts'
import {
  RecipeInputSchema,
  SubstitutionRuleInputSchema,
  type RecipeIngredientInputSchema,
} from './recipeSchema.ts'

type RawIngredient = z.output<typeof RecipeIngredientInputSchema>

function checkIngredient(raw: RawIngredient, issues: string[]): RecipeIngredient | null {
  const ingredient = normalizeIngredientName(raw.name)
  if (!ingredient) {
    issues.push('ingredient name must not be empty')
    return null
  }

  const qty = raw.qty ?? null
  const rawUnit = raw.unit?.trim() || null
  const label = `ingredient "${ingredient}"`
  let ok = true

  if (rawUnit !== null && (qty === null || qty <= 0)) {
    issues.push(`${label}: quantity must be positive when a unit is given`)
    ok = false
  } else if (qty !== null && qty <= 0) {
    issues.push(`${label}: quantity must be positive`)
    ok = false
  }
  if (raw.strict && qty === null) {
    issues.push(`${label}: strict ingredients need a quantity`)
    ok = false
  }

  const unit = rawUnit === null ? null : canonicalUnit(rawUnit)
  if (rawUnit !== null && unit === null) {
    issues.push(`${label}: unknown unit "${rawUnit}"`)
    ok = false
  }

  if (!ok) return null
  return {
    ingredient,
    qty,
    unit,
    family: unitFamily(unit),
    optional: raw.optional,
    strict: raw.strict,
  }
}

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>()
  const dupes = new Set<string>()
  for (const name of names) {
    if (seen.has(name)) dupes.add(name)
    seen.add(name)
  }
  return [...dupes]
}

/**
 * Validate and normalize one catalog entry. Collects every problem before
 * throwing so authors can fix a recipe in one pass.
 */
export function ingestRecipe(raw: unknown): Recipe {
  const parsed = RecipeInputSchema.safeParse(raw)
  if (!parsed.success) {
    const id = typeof raw === 'object' && raw !== null && 'id' in raw ? String(raw.id) : null
    throw new ValidationError(id, formatZodIssues(parsed.error))
  }

  const input = parsed.data
  const issues: string[] = []
  const id = input.id.trim()
  if (!id) issues.push('id must not be empty')
  if (!input.name.trim()) issues.push('name must not be empty')

  const ingredients = input.ingredients
    .map((ing) => checkIngredient(ing, issues))
    .filter((ing): ing is RecipeIngredient => ing !== null)
  const tools = input.tools.map(normalizeToolName).filter(Boolean)

  for (const name of findDuplicates(ingredients.map((i) => i.ingredient))) {
    issues.push(`ingredient "${name}" is listed more than once`)
  }
  for (const name of findDuplicates(tools)) {
    issues.push(`tool "${name}" is listed more than once`)
  }

  const ingredientNames = new Set(ingredients.map((i) => i.ingredient))
  const toolNames = new Set(tools)
  const substitutions: SubstitutionHint[] = []

  for (const hint of input.substitutions) {
    const normalize = hint.context === 'tool' ? normalizeToolName : normalizeIngredientName
    const target = normalize(hint.for)
    const alternatives = [...new Set(hint.alternatives.map(normalize).filter(Boolean))]
    const known = hint.context === 'tool' ? toolNames : ingredientNames

    if (!known.has(target)) {
      issues.push(`substitution for ${hint.context} "${target}" does not match any ${hint.context} in the recipe`)
    }
    if (alternatives.length === 0) {
      issues.push(`substitution for "${target}" has no alternatives`)
    }
    if (alternatives.includes(target)) {
      issues.push(`substitution for "${target}" lists itself as an alternative`)
    }
    substitutions.push({ for: target, alternatives, context: hint.context })
  }

  if (issues.length > 0) throw new ValidationError(id || null, issues)

  return {
    id,
    name: input.name.trim(),
    steps: input.steps.map((step) => step.trim()).filter(Boolean),
    ingredients,
    tools,
    substitutions,
  }
}

/**
 * Validate one global substitution rule. Alternatives come back ranked by
 * descending score, deduplicated, without the target itself.
 */
export function ingestSubstitutionRule(raw: unknown): SubstitutionRule {
  const parsed = SubstitutionRuleInputSchema.safeParse(raw)
  if (!parsed.success) throw new ValidationError(null, formatZodIssues(parsed.error))

  const { context } = parsed.data
  const normalize = context === 'tool' ? normalizeToolName : normalizeIngredientName
  const target = normalize(parsed.data.target)
  const seen = new Set<string>([target])
  const alternatives: Alternative[] = []

  for (const alt of parsed.data.alternatives) {
    const name = normalize(alt.name)
    if (!name || seen.has(name)) continue
    seen.add(name)
    alternatives.push({ name, score: alt.score })
  }

  if (alternatives.length === 0) {
    throw new ValidationError(null, [`rule for ${context} "${target}" has no usable alternatives`])
  }

  alternatives.sort((a, b) => b.score - a.score)
  return { target, context, alternatives }
}
