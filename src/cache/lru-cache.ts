import type { CacheStats } from '../types/index.js';
import { createLogger, type Logger } from '../logger.js';

export interface LruCacheOptions {
  /** Maximum number of entries (default 100) */
  maxSize?: number;
  /** Entry lifetime in seconds (default 300) */
  ttlSeconds?: number;
  /** Millisecond clock, replaceable in tests */
  clock?: () => number;
  logger?: Logger;
}

interface CacheNode<V> {
  key: string;
  value: V;
  storedAt: number;
  prev: number;
  next: number;
}

const NONE = -1;

/**
 * Bounded LRU cache with a per-entry TTL.
 *
 * Entries live in an arena of nodes addressed by index and are linked into
 * a doubly-linked list: head is the most recently used entry, tail the
 * least. A Map from key to node index gives O(1) lookup, promotion and
 * eviction. Freed arena slots are recycled through a free list.
 *
 * Eviction is strict LRU by list position and ignores TTL. Expired entries
 * are only dropped when touched by get() or by purgeExpired().
 *
 * Every method is synchronous, so the event loop already runs them one at
 * a time; no extra locking is needed.
 */
export class LruCache<V> {
  readonly maxSize: number;
  readonly ttlMs: number;

  private nodes: Array<CacheNode<V> | undefined> = [];
  private freeSlots: number[] = [];
  private index = new Map<string, number>();
  private head = NONE;
  private tail = NONE;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  private clock: () => number;
  private logger: Logger;

  constructor(options: LruCacheOptions = {}) {
    const maxSize = options.maxSize ?? 100;
    const ttlSeconds = options.ttlSeconds ?? 300;
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
    }
    if (!(ttlSeconds > 0)) {
      throw new RangeError(`ttlSeconds must be positive, got ${ttlSeconds}`);
    }

    this.maxSize = maxSize;
    this.ttlMs = ttlSeconds * 1000;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('cache');
    this.logger.info('Cache initialized', { maxSize, ttlSeconds });
  }

  get size(): number {
    return this.index.size;
  }

  get(key: string): V | undefined {
    const slot = this.index.get(key);
    const node = slot === undefined ? undefined : this.nodes[slot];
    if (slot === undefined || !node) {
      this.misses++;
      this.logger.debug('Cache miss', { key });
      return undefined;
    }

    if (this.isExpired(node)) {
      this.unlink(slot);
      this.misses++;
      this.logger.debug('Cache miss (expired)', { key });
      return undefined;
    }

    this.moveToHead(slot);
    this.hits++;
    this.logger.debug('Cache hit', { key });
    return node.value;
  }

  set(key: string, value: V): void {
    const existing = this.index.get(key);
    const existingNode = existing === undefined ? undefined : this.nodes[existing];
    if (existing !== undefined && existingNode) {
      existingNode.value = value;
      existingNode.storedAt = this.clock();
      this.moveToHead(existing);
      this.logger.debug('Cache update', { key });
      return;
    }

    if (this.index.size >= this.maxSize) {
      this.evictLeastRecent();
    }

    const node: CacheNode<V> = { key, value, storedAt: this.clock(), prev: NONE, next: NONE };
    const slot = this.allocate(node);
    this.index.set(key, slot);
    this.linkAtHead(slot, node);
    this.logger.debug('Cache set', { key, size: this.index.size });
  }

  delete(key: string): boolean {
    const slot = this.index.get(key);
    if (slot === undefined) return false;

    this.unlink(slot);
    this.logger.debug('Cache delete', { key });
    return true;
  }

  clear(): void {
    const sizeBefore = this.index.size;
    this.nodes = [];
    this.freeSlots = [];
    this.index.clear();
    this.head = NONE;
    this.tail = NONE;
    this.logger.info('Cache cleared', { removed: sizeBefore });
  }

  /** Removes every key containing the substring */
  invalidatePattern(pattern: string): number {
    const matching = [...this.index.keys()].filter((key) => key.includes(pattern));
    for (const key of matching) {
      const slot = this.index.get(key);
      if (slot !== undefined) this.unlink(slot);
    }

    if (matching.length > 0) {
      this.logger.info('Cache invalidated', { pattern, removed: matching.length });
    }
    return matching.length;
  }

  /** Drops every expired entry without waiting for it to be read */
  purgeExpired(): number {
    const expired: number[] = [];
    for (const slot of this.index.values()) {
      const node = this.nodes[slot];
      if (node && this.isExpired(node)) expired.push(slot);
    }
    for (const slot of expired) this.unlink(slot);

    if (expired.length > 0) {
      this.logger.info('Expired entries purged', { removed: expired.length });
    }
    return expired.length;
  }

  /** Keys from most to least recently used */
  keys(): string[] {
    const result: string[] = [];
    let cursor = this.head;
    while (cursor !== NONE) {
      const node = this.nodes[cursor];
      if (!node) break;
      result.push(node.key);
      cursor = node.next;
    }
    return result;
  }

  stats(): CacheStats {
    const requests = this.hits + this.misses;
    const hitRate = requests > 0 ? Math.round((this.hits / requests) * 10000) / 100 : 0;
    return {
      size: this.index.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate,
    };
  }

  // -------------------------------------------------------------------------
  // List plumbing
  // -------------------------------------------------------------------------

  private isExpired(node: CacheNode<V>): boolean {
    return this.clock() - node.storedAt > this.ttlMs;
  }

  private evictLeastRecent(): void {
    const slot = this.tail;
    const node = slot === NONE ? undefined : this.nodes[slot];
    if (!node) return;

    this.unlink(slot);
    this.evictions++;
    this.logger.debug('Cache evict', { key: node.key });
  }

  private allocate(node: CacheNode<V>): number {
    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      this.nodes[reused] = node;
      return reused;
    }
    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  private linkAtHead(slot: number, node: CacheNode<V>): void {
    node.prev = NONE;
    node.next = this.head;
    const oldHead = this.head === NONE ? undefined : this.nodes[this.head];
    if (oldHead) oldHead.prev = slot;
    this.head = slot;
    if (this.tail === NONE) this.tail = slot;
  }

  private detach(node: CacheNode<V>): void {
    const prev = node.prev === NONE ? undefined : this.nodes[node.prev];
    const next = node.next === NONE ? undefined : this.nodes[node.next];

    if (prev) prev.next = node.next;
    else this.head = node.next;

    if (next) next.prev = node.prev;
    else this.tail = node.prev;

    node.prev = NONE;
    node.next = NONE;
  }

  private moveToHead(slot: number): void {
    const node = this.nodes[slot];
    if (!node || this.head === slot) return;
    this.detach(node);
    this.linkAtHead(slot, node);
  }

  /** Removes the node from the list, the index and the arena */
  private unlink(slot: number): void {
    const node = this.nodes[slot];
    if (!node) return;
    this.detach(node);
    this.index.delete(node.key);
    this.nodes[slot] = undefined;
    this.freeSlots.push(slot);
  }
}
