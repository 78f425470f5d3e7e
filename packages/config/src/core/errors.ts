import { BaseError } from "@evictkit/errors"

export class ConfigValidationError extends BaseError<"config_validation_failed"> {
  constructor(details: string, issues: readonly string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_validation_failed",
      context: { issues },
    })
  }
}
