export const EVICTION_POLICY_NAMES = ["fifo", "lifo", "lru", "mru", "lfu"] as const

/**
 * Built-in eviction policies.
 *
 * - `fifo`: evicts the oldest inserted entry; reads do not matter.
 * - `lifo`: evicts the newest inserted entry; reads do not matter.
 * - `lru`: evicts the entry untouched for the longest time.
 * - `mru`: evicts the entry touched most recently.
 * - `lfu`: evicts the entry with the fewest accesses, oldest at that count first.
 */
export type EvictionPolicyName = (typeof EVICTION_POLICY_NAMES)[number]

export function isEvictionPolicyName(value: unknown): value is EvictionPolicyName {
  return typeof value === "string" && EVICTION_POLICY_NAMES.some((name) => name === value)
}
