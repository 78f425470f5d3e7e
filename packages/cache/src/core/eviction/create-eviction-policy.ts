import { isEvictionPolicyName } from "../../ports/cache-eviction-policy"
import type { EvictionPolicy } from "../../ports/eviction-policy"
import { InvalidConfigurationError } from "../errors"
import { FifoPolicy } from "./fifo-policy"
import { LfuPolicy } from "./lfu-policy"
import { LifoPolicy } from "./lifo-policy"
import { LruPolicy } from "./lru-policy"
import { MruPolicy } from "./mru-policy"

/**
 * Build a fresh built-in policy. Takes a plain string so names read from
 * configuration can be passed through unchecked.
 */
export function createEvictionPolicy<K>(name: string): EvictionPolicy<K> {
  if (!isEvictionPolicyName(name)) {
    throw new InvalidConfigurationError(`Unknown eviction policy "${name}"`, { policy: name })
  }

  switch (name) {
    case "fifo":
      return new FifoPolicy<K>()
    case "lifo":
      return new LifoPolicy<K>()
    case "lru":
      return new LruPolicy<K>()
    case "mru":
      return new MruPolicy<K>()
    case "lfu":
      return new LfuPolicy<K>()
  }
}
