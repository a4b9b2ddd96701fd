export type LarderErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'CONFIG'

export class LarderError extends Error {
  readonly code: LarderErrorCode

  constructor(code: LarderErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/** Malformed catalog or inventory input. Raised at ingestion, never while matching. */
export class ValidationError extends LarderError {
  readonly recipeId: string | null
  readonly issues: string[]

  constructor(recipeId: string | null, issues: string[]) {
    const subject = recipeId ? `Recipe "${recipeId}"` : 'Input'
    super('VALIDATION', `${subject} is invalid: ${issues.join('; ')}`)
    this.recipeId = recipeId
    this.issues = issues
  }
}

export type NotFoundKind = 'recipe' | 'shopping-entry'

export class NotFoundError extends LarderError {
  readonly kind: NotFoundKind
  readonly id: string

  constructor(kind: NotFoundKind, id: string) {
    super('NOT_FOUND', `No ${kind} with id "${id}"`)
    this.kind = kind
    this.id = id
  }
}

export class ConfigError extends LarderError {
  constructor(message: string) {
    super('CONFIG', message)
  }
}
