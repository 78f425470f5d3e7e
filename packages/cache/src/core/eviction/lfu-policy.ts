import type { EvictionPolicy } from "../../ports/eviction-policy"
import { KeyList } from "./key-list"

type Bucket<K> = {
  readonly frequency: number
  readonly keys: KeyList<K>
  prev: Bucket<K> | undefined
  next: Bucket<K> | undefined
}

/**
 * Least-frequently-used with frequency buckets.
 *
 * Buckets form a linked list in ascending frequency; each lists the keys
 * sharing one access count, in the order they reached it. The victim is the
 * oldest key of the lowest bucket. Every hook is O(1).
 */
export class LfuPolicy<K> implements EvictionPolicy<K> {
  readonly name = "lfu"
  private readonly index = new Map<K, Bucket<K>>()
  private lowest: Bucket<K> | undefined

  onInsert(key: K): void {
    if (this.index.has(key)) {
      this.onAccess(key)

      return
    }

    const bucket =
      this.lowest?.frequency === 1 ? this.lowest : this.insertBucketAfter(undefined, 1)

    bucket.keys.push(key)
    this.index.set(key, bucket)
  }

  onAccess(key: K): void {
    const bucket = this.index.get(key)
    if (!bucket) return

    const frequency = bucket.frequency + 1
    const target =
      bucket.next?.frequency === frequency
        ? bucket.next
        : this.insertBucketAfter(bucket, frequency)

    bucket.keys.remove(key)
    target.keys.push(key)
    this.index.set(key, target)

    this.dropIfEmpty(bucket)
  }

  onEvict(key: K): void {
    const bucket = this.index.get(key)
    if (!bucket) return

    this.index.delete(key)
    bucket.keys.remove(key)

    this.dropIfEmpty(bucket)
  }

  victim(): K | undefined {
    return this.lowest?.keys.first()
  }

  size(): number {
    return this.index.size
  }

  clear(): void {
    this.index.clear()
    this.lowest = undefined
  }

  frequencyOf(key: K): number | undefined {
    return this.index.get(key)?.frequency
  }

  /**
   * Distinct access counts currently held, lowest first.
   */
  frequencies(): number[] {
    const out: number[] = []

    for (let bucket = this.lowest; bucket; bucket = bucket.next) {
      out.push(bucket.frequency)
    }

    return out
  }

  /**
   * Link a new bucket after `prev`, or at the head when `prev` is undefined.
   */
  private insertBucketAfter(prev: Bucket<K> | undefined, frequency: number): Bucket<K> {
    const next = prev ? prev.next : this.lowest
    const bucket: Bucket<K> = { frequency, keys: new KeyList<K>(), prev, next }

    if (prev) prev.next = bucket
    else this.lowest = bucket

    if (next) next.prev = bucket

    return bucket
  }

  private dropIfEmpty(bucket: Bucket<K>): void {
    if (bucket.keys.size() > 0) return

    if (bucket.prev) bucket.prev.next = bucket.next
    else this.lowest = bucket.next

    if (bucket.next) bucket.next.prev = bucket.prev
  }
}
