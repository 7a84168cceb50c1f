/**
 * Hashes a store in progress is about to reference. A removal sweep treats
 * them as referenced until the owning manifest record is on disk.
 */
export class InflightReferences {
  private readonly counts = new Map<string, number>();

  acquire(hashes: Iterable<string>): () => void {
    const held = [...new Set(hashes)];
    for (const h of held) this.counts.set(h, (this.counts.get(h) ?? 0) + 1);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const h of held) {
        const next = (this.counts.get(h) ?? 1) - 1;
        if (next <= 0) this.counts.delete(h);
        else this.counts.set(h, next);
      }
    };
  }

  has(hash: string): boolean {
    return this.counts.has(hash);
  }

  get size(): number {
    return this.counts.size;
  }
}
