type KeyNode<K> = {
  readonly key: K
  prev: KeyNode<K> | undefined
  next: KeyNode<K> | undefined
}

/**
 * Doubly-linked list of distinct keys with a key→node index.
 *
 * Append, unlink and move-to-tail are O(1). Head is the oldest position,
 * tail the newest.
 */
export class KeyList<K> {
  private readonly index = new Map<K, KeyNode<K>>()
  private head: KeyNode<K> | undefined
  private tail: KeyNode<K> | undefined

  size(): number {
    return this.index.size
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  first(): K | undefined {
    return this.head?.key
  }

  last(): K | undefined {
    return this.tail?.key
  }

  /**
   * Append `key` at the tail. A key already in the list is moved there.
   */
  push(key: K): void {
    const existing = this.index.get(key)

    if (existing) {
      this.moveNodeToTail(existing)

      return
    }

    const node: KeyNode<K> = { key, prev: this.tail, next: undefined }

    if (this.tail) this.tail.next = node
    else this.head = node

    this.tail = node
    this.index.set(key, node)
  }

  /**
   * Returns false when the key is not in the list.
   */
  moveToTail(key: K): boolean {
    const node = this.index.get(key)
    if (!node) return false

    this.moveNodeToTail(node)

    return true
  }

  remove(key: K): boolean {
    const node = this.index.get(key)
    if (!node) return false

    this.unlink(node)
    this.index.delete(key)

    return true
  }

  clear(): void {
    this.index.clear()
    this.head = undefined
    this.tail = undefined
  }

  *[Symbol.iterator](): Generator<K> {
    for (let node = this.head; node; node = node.next) {
      yield node.key
    }
  }

  private moveNodeToTail(node: KeyNode<K>): void {
    if (node === this.tail) return

    this.unlink(node)

    node.prev = this.tail
    node.next = undefined

    if (this.tail) this.tail.next = node
    else this.head = node

    this.tail = node
  }

  private unlink(node: KeyNode<K>): void {
    if (node.prev) node.prev.next = node.next
    else this.head = node.next

    if (node.next) node.next.prev = node.prev
    else this.tail = node.prev

    node.prev = undefined
    node.next = undefined
  }
}
