import type { ResultSet } from './result-projector.js';
import { debug } from './runtime.js';
import type { SchemaGraph } from './schema-graph.js';

/**
 * In-memory state for one connection session: the current schema graph and
 * a bounded LRU of recent result sets keyed by statement fingerprint.
 *
 * Nothing here refreshes itself; callers decide when data is stale.
 */
export class SessionCache {
  readonly capacity: number;
  private graph: SchemaGraph | null = null;
  private graphGeneration = 0;
  private readonly results = new Map<string, ResultSet>();

  constructor(capacity: number) {
    this.capacity = Math.max(0, Math.floor(capacity));
  }

  get generation(): number {
    return this.graphGeneration;
  }

  get size(): number {
    return this.results.size;
  }

  getGraph(): SchemaGraph | null {
    return this.graph;
  }

  /**
   * Swap in a freshly built graph. Results planned against the previous graph
   * are dropped with it.
   */
  setGraph(graph: SchemaGraph): number {
    this.graph = graph;
    this.graphGeneration += 1;
    this.results.clear();
    debug.db(`Schema graph generation ${this.graphGeneration} installed (${graph.size} models)`);
    return this.graphGeneration;
  }

  getResult(fingerprint: string): ResultSet | null {
    const hit = this.results.get(fingerprint);
    if (!hit) {
      return null;
    }
    // Re-insert to mark as most recently used.
    this.results.delete(fingerprint);
    this.results.set(fingerprint, hit);
    return hit;
  }

  setResult(fingerprint: string, result: ResultSet): void {
    if (this.capacity === 0) {
      return;
    }
    this.results.delete(fingerprint);
    this.results.set(fingerprint, result);
    while (this.results.size > this.capacity) {
      const oldest = this.results.keys().next();
      if (oldest.done) break;
      this.results.delete(oldest.value);
    }
  }

  /**
   * Drop the graph and every cached result.
   */
  invalidate(): void {
    this.graph = null;
    this.results.clear();
    debug.db('Session cache invalidated');
  }
}

export default SessionCache;
