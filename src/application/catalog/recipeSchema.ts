import { z } from 'zod'

export const RecipeIngredientInputSchema = z.object({
  name: z.string(),
  qty: z.number().nullish(),
  unit: z.string().nullish(),
  optional: z.boolean().default(false),
  strict: z.boolean().default(false),
})

export const SubstitutionHintInputSchema = z.object({
  for: z.string(),
  alternatives: z.array(z.string()),
  context: z.enum(['ingredient', 'tool']).default('ingredient'),
})

export const RecipeInputSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  steps: z.array(z.string()).default([]),
  ingredients: z.array(RecipeIngredientInputSchema).default([]),
  tools: z.array(z.string()).default([]),
  substitutions: z.array(SubstitutionHintInputSchema).default([]),
})

export const SubstitutionRuleInputSchema = z.object({
  target: z.string().min(1),
  context: z.enum(['ingredient', 'tool']).default('ingredient'),
  alternatives: z
    .array(
      z.object({
        name: z.string().min(1),
        score: z.number().min(0).max(1),
      }),
    )
    .min(1),
})

export type RecipeInput = z.input<typeof RecipeInputSchema>
export type SubstitutionRuleInput = z.input<typeof SubstitutionRuleInputSchema>
