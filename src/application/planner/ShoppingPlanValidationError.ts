import type { ZodError } from 'zod'

/** Thrown when a planner request is structurally malformed. */
export class ShoppingPlanValidationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid shopping plan request: ${issues.join('; ')}`)
    this.name = 'ShoppingPlanValidationError'
    this.issues = issues
  }

  static fromZodError(error: ZodError): ShoppingPlanValidationError {
    return new ShoppingPlanValidationError(
      error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    )
  }
}
