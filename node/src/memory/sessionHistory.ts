import { v4 as uuidv4 } from 'uuid';
import type { HistoryTurn } from '@/services/prompt-templates';
import { stripCitations } from '@/services/synthesis/citations';
import type { Report } from '@/types/core';

export interface HistoryEntry {
  id: string;
  query: string;
  report: Report;
  createdAt: string;
}

/**
 * Bounded in-memory archive of finished reports, oldest evicted first.
 * Also supplies recent question/answer pairs as conversational context.
 */
export class SessionHistory {
  private entries: HistoryEntry[] = [];

  constructor(
    private readonly maxEntries: number = 50,
    private readonly now: () => Date = () => new Date(),
  ) {}

  add(report: Report, id: string = uuidv4()): HistoryEntry {
    const entry: HistoryEntry = {
      id,
      query: report.query,
      report,
      createdAt: this.now().toISOString(),
    };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(this.entries.length - this.maxEntries);
    }
    return entry;
  }

  get(id: string): HistoryEntry | undefined {
    return this.entries.find((e) => e.id === id);
  }

  /** Newest first. */
  list(): HistoryEntry[] {
    return [...this.entries].reverse();
  }

  /**
   * Oldest first, as conversation turns. Citation markers are dropped: their
   * indices belong to the earlier run's sources.
   */
  recentTurns(limit: number): HistoryTurn[] {
    return this.entries.slice(-limit).map((e) => ({
      query: e.query,
      answer: stripCitations(e.report.summary || e.report.body),
    }));
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}
