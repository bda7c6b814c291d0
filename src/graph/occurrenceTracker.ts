// Counts never go down within a session; collapsing a subtree does not un-count it.
export class OccurrenceTracker {
  private readonly counts = new Map<string, number>();

  /** Returns true when `paperId` has been seen before in this session. */
  recordOccurrence(paperId: string): boolean {
    const previous = this.counts.get(paperId) ?? 0;
    this.counts.set(paperId, previous + 1);
    return previous > 0;
  }

  count(paperId: string): number {
    return this.counts.get(paperId) ?? 0;
  }

  clear(): void {
    this.counts.clear();
  }
}
