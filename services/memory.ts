import type { MemoryEntry } from "../types";
import { INTERVIEW_POLICY } from "./policy";

export interface MemoryLimits {
  maxEntries: number;
  evictEntries: number;
}

const DEFAULT_LIMITS: MemoryLimits = {
  maxEntries: INTERVIEW_POLICY.MEMORY.MAX_ENTRIES,
  evictEntries: INTERVIEW_POLICY.MEMORY.EVICT_ENTRIES,
};

/**
 * Prompt-context memory with watermark eviction: once the entry count goes
 * past `maxEntries`, the oldest `evictEntries` are dropped in one step.
 * Eviction looks only at the count, never at how recently an entry was used.
 */
export class ConversationMemory {
  private entries: MemoryEntry[];

  constructor(entries: readonly MemoryEntry[] = [], private readonly limits: MemoryLimits = DEFAULT_LIMITS) {
    this.entries = entries.map(entry => ({ ...entry }));
  }

  public get size() { return this.entries.length; }

  public snapshot(): MemoryEntry[] {
    return this.entries.map(entry => ({ ...entry }));
  }

  public append(entry: MemoryEntry) {
    this.entries.push({ ...entry });
  }

  /** Drops the trailing question entry of a turn whose question is being re-issued. */
  public discardPendingQuestion(turn: number): boolean {
    const last = this.entries[this.entries.length - 1];
    if (last && last.kind === 'question' && last.turn === turn) {
      this.entries.pop();
      return true;
    }
    return false;
  }

  /** Returns the number of evicted entries. */
  public prune(): number {
    if (this.entries.length <= this.limits.maxEntries) return 0;
    const evicted = Math.min(this.limits.evictEntries, this.entries.length);
    this.entries = this.entries.slice(evicted);
    return evicted;
  }

  public clear() {
    this.entries = [];
  }

  /** Renders the entries as prompt context. */
  public format(): string {
    if (this.entries.length === 0) return 'No previous questions asked yet.';
    return this.entries
      .map(entry => (entry.kind === 'question' ? `Q${entry.turn}: ${entry.content}` : `A${entry.turn}: ${entry.content}`))
      .join('\n');
  }
}
