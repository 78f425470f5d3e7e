import { BaseError, type ErrorContext } from "@evictkit/errors"

/**
 * Bad construction input: non-positive capacity, unknown policy name, or a
 * policy instance already attached to another cache. No cache is created.
 */
export class InvalidConfigurationError extends BaseError<"invalid_configuration"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "invalid_configuration", context })
  }
}

/**
 * A policy failed to name a tracked victim while the cache was full.
 * Only a faulty custom policy can cause this.
 */
export class EvictionInvariantError extends BaseError<"eviction_invariant_violation"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, {
      code: "eviction_invariant_violation",
      context,
      isOperational: false,
    })
  }
}
