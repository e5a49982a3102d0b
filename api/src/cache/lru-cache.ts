/**
 * LRU Cache
 * @module cache/lru-cache
 *
 * In-memory LRU map with O(1) operations.
 * Uses a doubly linked list + Map for access ordering and eviction.
 */

interface LRUNode<K, V> {
  key: K;
  value: V;
  prev: LRUNode<K, V> | null;
  next: LRUNode<K, V> | null;
}

export class LRUCache<K, V> {
  private readonly capacity: number;
  private readonly cache: Map<K, LRUNode<K, V>>;
  private readonly onEvict?: (key: K, value: V) => void;
  private head: LRUNode<K, V> | null = null;
  private tail: LRUNode<K, V> | null = null;

  constructor(capacity: number = 10000, onEvict?: (key: K, value: V) => void) {
    this.capacity = Math.max(1, capacity);
    this.cache = new Map();
    this.onEvict = onEvict;
  }

  /**
   * Get value from cache and mark it most recently used
   */
  get(key: K): V | undefined {
    const node = this.cache.get(key);
    if (!node) {
      return undefined;
    }

    this.moveToFront(node);
    return node.value;
  }

  set(key: K, value: V): void {
    const existing = this.cache.get(key);

    if (existing) {
      existing.value = value;
      this.moveToFront(existing);
      return;
    }

    const node: LRUNode<K, V> = { key, value, prev: null, next: null };
    this.cache.set(key, node);
    this.addToFront(node);

    if (this.cache.size > this.capacity) {
      this.evictLRU();
    }
  }

  delete(key: K): boolean {
    const node = this.cache.get(key);
    if (!node) return false;

    this.removeNode(node);
    this.cache.delete(key);
    return true;
  }

  clear(): void {
    this.cache.clear();
    this.head = null;
    this.tail = null;
  }

  /**
   * Snapshot of current keys, most recently used first
   */
  keys(): K[] {
    const keys: K[] = [];
    for (let node = this.head; node; node = node.next) {
      keys.push(node.key);
    }
    return keys;
  }

  get size(): number {
    return this.cache.size;
  }

  // Private helper methods

  private moveToFront(node: LRUNode<K, V>): void {
    if (node === this.head) return;

    this.removeNode(node);
    this.addToFront(node);
  }

  private addToFront(node: LRUNode<K, V>): void {
    node.prev = null;
    node.next = this.head;

    if (this.head) {
      this.head.prev = node;
    }

    this.head = node;

    if (!this.tail) {
      this.tail = node;
    }
  }

  private removeNode(node: LRUNode<K, V>): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }
  }

  private evictLRU(): void {
    const lru = this.tail;
    if (!lru) return;

    this.removeNode(lru);
    this.cache.delete(lru.key);
    this.onEvict?.(lru.key, lru.value);
  }
}
