import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { ValidationError } from '@domain/errors.ts'
import { buildCatalog, type CatalogBuildResult } from '@application/catalog/buildCatalog.ts'
import { formatZodIssues } from '@application/validation/zodIssues.ts'
import { loadConfig, type LarderConfig } from '../../config.ts'

export const RECIPES_FILE = 'recipes.json'
export const SUBSTITUTIONS_FILE = 'substitutions.json'

const RecipesFileSchema = z.object({
  version: z.string().min(1),
  recipes: z.array(z.unknown()),
})

const SubstitutionsFileSchema = z.object({
  rules: z.array(z.unknown()),
})

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

async function readJson<T>(path: string, schema: z.ZodType<T>): Promise<T> {
  const text = await readFile(path, 'utf-8')
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    throw new ValidationError(null, [`${path}: ${err instanceof Error ? err.message : String(err)}`])
  }
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw new ValidationError(null, formatZodIssues(parsed.error).map((issue) => `${path}: ${issue}`))
  }
  return parsed.data
}

/**
 * Build a catalog from `recipes.json` and, when present, `substitutions.json`
 * in `dir`. Individual bad recipes are rejected; a malformed file throws.
 */
export async function loadCatalogFromDirectory(dir: string): Promise<CatalogBuildResult> {
  const recipeFile = await readJson(join(dir, RECIPES_FILE), RecipesFileSchema)

  let rules: unknown[] = []
  try {
    rules = (await readJson(join(dir, SUBSTITUTIONS_FILE), SubstitutionsFileSchema)).rules
  } catch (err) {
    if (!isMissingFile(err)) throw err
  }

  const result = buildCatalog({
    version: recipeFile.version,
    recipes: recipeFile.recipes,
    substitutions: rules,
  })
  console.info(
    `[Larder] Loaded catalog ${result.catalog.version}: ${result.catalog.recipes.size} recipes, ` +
      `${result.catalog.substitutions.size} substitution rules, ${result.rejections.length} rejected`,
  )
  return result
}

export async function loadDefaultCatalog(config: LarderConfig = loadConfig()): Promise<CatalogBuildResult> {
  return loadCatalogFromDirectory(config.dataDir)
}
