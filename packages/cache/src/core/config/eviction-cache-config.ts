import { EnvSource, type IConfig, loadConfig, ObjectSource } from "@evictkit/config"
import { createPinoLogger, type Logger, logLevelNames } from "@evictkit/logger"
import { z } from "zod"
import { EVICTION_POLICY_NAMES } from "../../ports/cache-eviction-policy"
import type { EvictionListener } from "../../ports/eviction-listener"
import { createEvictionCache, type EvictionCache } from "../eviction-cache"

export const evictionCacheConfigSchema = z.object({
  CACHE_CAPACITY: z.coerce.number().int().positive().default(1000),
  CACHE_EVICTION_POLICY: z.enum(EVICTION_POLICY_NAMES).default("lru"),
  CACHE_NAME: z.string().min(1).default("default"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type EvictionCacheConfig = z.infer<typeof evictionCacheConfigSchema>

export type LoadEvictionCacheConfigOptions = {
  /** Default: `process.env` */
  env?: Readonly<Record<string, string | undefined>>
  /** e.g. "APP_" to read `APP_CACHE_CAPACITY`. */
  prefix?: string
  /** Applied last; wins over the environment. */
  overrides?: Readonly<Record<string, unknown>>
}

export async function loadEvictionCacheConfig(
  opts: LoadEvictionCacheConfigOptions = {},
): Promise<IConfig<EvictionCacheConfig>> {
  return loadConfig({
    schema: evictionCacheConfigSchema,
    sources: [
      new EnvSource({
        ...(opts.env && { env: opts.env }),
        ...(opts.prefix && { prefix: opts.prefix }),
      }),
      ...(opts.overrides ? [new ObjectSource(opts.overrides)] : []),
    ],
  })
}

export type EvictionCacheFromConfigDeps<K, V> = {
  /**
   * Default: a pino logger honoring `LOG_LEVEL` and `LOG_PRETTY`.
   */
  logger?: Logger
  onEvict?: EvictionListener<K, V>
}

export function createEvictionCacheFromConfig<K, V>(
  config: EvictionCacheConfig,
  deps: EvictionCacheFromConfigDeps<K, V> = {},
): EvictionCache<K, V> {
  const logger =
    deps.logger ??
    createPinoLogger({}, { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY })

  return createEvictionCache<K, V>({
    capacity: config.CACHE_CAPACITY,
    policy: config.CACHE_EVICTION_POLICY,
    name: config.CACHE_NAME,
    logger,
    ...(deps.onEvict && { onEvict: deps.onEvict }),
  })
}
