import { stripPrivateThoughts } from './actions/sanitizer.js';

export interface LedgerEntry {
  round: number;
  speaker: string;
  content: string;
}

/**
 * Everything said aloud during the days of one game, oldest first. Agents
 * see a bounded tail of it; private thoughts never enter it.
 */
export class PublicLedger {
  private readonly entries: LedgerEntry[] = [];

  add(round: number, speaker: string, content: string): void {
    const text = stripPrivateThoughts(content);
    if (!text) return;
    this.entries.push({ round, speaker, content: text });
  }

  get size(): number {
    return this.entries.length;
  }

  recent(limit: number): readonly LedgerEntry[] {
    return limit > 0 ? this.entries.slice(-limit) : [];
  }

  /** The last `limit` messages as "Name: message" paragraphs. */
  render(limit: number): string {
    return this.recent(limit)
      .map(e => `${e.speaker}: ${e.content}`)
      .join('\n\n');
  }
}
