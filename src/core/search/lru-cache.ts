/**
 * LRU Cache
 *
 * Fixed-capacity cache with O(1) get/set via a map plus a doubly linked
 * recency list. The search manager keeps fully ranked result lists here,
 * keyed by snapshot version, so a new snapshot simply misses.
 *
 * @module
 */

// =============================================================================
// Doubly Linked List Node for O(1) operations
// =============================================================================

class LRUNode<K, V> {
  prev: LRUNode<K, V> | null = null;
  next: LRUNode<K, V> | null = null;

  constructor(
    readonly key: K,
    public value: V
  ) {}
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  maxSize: number;
  hitRate: number;
}

export interface LRUCacheConfig<K, V> {
  /** Zero disables caching */
  maxSize: number;
  onEvict?: (key: K, value: V) => void;
}

// =============================================================================
// LRU Cache Implementation
// =============================================================================

export class LRUCache<K, V> {
  private map = new Map<K, LRUNode<K, V>>();
  private head: LRUNode<K, V> | null = null;
  private tail: LRUNode<K, V> | null = null;
  private readonly maxSize: number;
  private readonly onEvict: (key: K, value: V) => void;
  private _stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(config: LRUCacheConfig<K, V>) {
    this.maxSize = Math.max(0, config.maxSize);
    this.onEvict = config.onEvict ?? (() => {});
  }

  get(key: K): V | undefined {
    const node = this.map.get(key);
    if (!node) {
      this._stats.misses++;
      return undefined;
    }

    this.moveToFront(node);
    this._stats.hits++;
    return node.value;
  }

  set(key: K, value: V): void {
    if (this.maxSize === 0) return;

    const existing = this.map.get(key);
    if (existing) {
      existing.value = value;
      this.moveToFront(existing);
      return;
    }

    while (this.map.size >= this.maxSize && this.tail) {
      this.evictOldest();
    }

    const node = new LRUNode(key, value);
    this.map.set(key, node);
    this.addToFront(node);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  size(): number {
    return this.map.size;
  }

  stats(): CacheStats {
    const total = this._stats.hits + this._stats.misses;
    return {
      hits: this._stats.hits,
      misses: this._stats.misses,
      evictions: this._stats.evictions,
      size: this.map.size,
      maxSize: this.maxSize,
      hitRate: total > 0 ? this._stats.hits / total : 0,
    };
  }

  // ==========================================================================
  // Internal Methods
  // ==========================================================================

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

  private moveToFront(node: LRUNode<K, V>): void {
    if (node === this.head) return;

    if (node.prev) node.prev.next = node.next;
    if (node.next) node.next.prev = node.prev;
    if (node === this.tail) this.tail = node.prev;

    this.addToFront(node);
  }

  private deleteNode(node: LRUNode<K, V>): void {
    if (node.prev) node.prev.next = node.next;
    if (node.next) node.next.prev = node.prev;
    if (node === this.head) this.head = node.next;
    if (node === this.tail) this.tail = node.prev;

    this.map.delete(node.key);
    this.onEvict(node.key, node.value);
  }

  private evictOldest(): void {
    if (!this.tail) return;
    this.deleteNode(this.tail);
    this._stats.evictions++;
  }
}
