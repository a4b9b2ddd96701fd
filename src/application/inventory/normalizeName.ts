const KEEP_TRAILING_S = ['ss', 'sses', 'us', 'is']

function collapse(name: string): string {
  return name.toLowerCase().trim().replace(/\s+/g, ' ')
}

/**
 * Canonical ingredient name: lowercased, whitespace collapsed, simple
 * English plurals reduced ("tomatoes" -> "tomato", "berries" -> "berry").
 * Words that naturally end in s ("hummus", "molasses") are left alone.
 */
export function normalizeIngredientName(name: string): string {
  const normalized = collapse(name)

  if (
    normalized.length <= 3 ||
    !normalized.endsWith('s') ||
    KEEP_TRAILING_S.some((suffix) => normalized.endsWith(suffix))
  ) {
    return normalized
  }

  if (normalized.endsWith('ies')) return normalized.slice(0, -3) + 'y'
  if (/(ea|oa|l)ves$/.test(normalized)) return normalized.slice(0, -3) + 'f'
  if (normalized.endsWith('oes')) return normalized.slice(0, -2)
  if (/(ch|sh|x|z)es$/.test(normalized)) return normalized.slice(0, -2)
  return normalized.slice(0, -1)
}

/** Tools keep their plural ("tongs"); only case and spacing are normalized. */
export function normalizeToolName(name: string): string {
  return collapse(name)
}

/** Split a comma-separated entry field into trimmed, non-empty items. */
export function splitEntryList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}
