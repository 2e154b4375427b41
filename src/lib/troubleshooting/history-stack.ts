/**
 * History Stack: bounded back-navigation memory for one session.
 *
 * Oldest entries are evicted first on overflow, the same policy the
 * navigation codec applies when a token runs out of room, so the stack and
 * the token never disagree about which entries survive.
 */

import { getHistoryMaxDepth } from "@/lib/config";

export class HistoryStack {
  private readonly entries: string[];
  readonly maxDepth: number;

  constructor(entries: readonly string[] = [], maxDepth: number = getHistoryMaxDepth()) {
    this.maxDepth = Math.max(1, maxDepth);
    this.entries = entries.slice(-this.maxDepth);
  }

  get length(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Record the node being left. Evicts the oldest entry when full. */
  push(nodeId: string): void {
    this.entries.push(nodeId);
    if (this.entries.length > this.maxDepth) {
      this.entries.splice(0, this.entries.length - this.maxDepth);
    }
  }

  /** Most recent entry, removed. Null when empty (at root). */
  pop(): string | null {
    return this.entries.pop() ?? null;
  }

  peek(): string | null {
    return this.entries.length > 0 ? this.entries[this.entries.length - 1] : null;
  }

  /**
   * Arriving at a node that is already in history (a loop back to an earlier
   * step) collapses the loop: the node and everything after it are dropped.
   */
  arriveAt(nodeId: string): void {
    const at = this.entries.lastIndexOf(nodeId);
    if (at !== -1) this.entries.splice(at);
  }

  clear(): void {
    this.entries.length = 0;
  }

  toArray(): string[] {
    return [...this.entries];
  }
}
