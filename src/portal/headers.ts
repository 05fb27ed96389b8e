/**
 * Ordered, case-insensitive header mapping for a portal session
 *
 * Merge points: context headers from the configuration call and
 * transfer headers around the binary PUT. Reset point: login().
 */

export class HeaderBag {
  /** Keyed by lower-cased name; keeps the casing of the last write */
  private entries = new Map<string, { name: string; value: string }>();

  constructor(initial: Record<string, string> = {}) {
    this.merge(initial);
  }

  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase())?.value;
  }

  /**
   * Sets a header, replacing any existing value regardless of casing
   */
  set(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.entries.get(key);
    if (existing) {
      // Keep the original insertion slot
      existing.name = name;
      existing.value = value;
    } else {
      this.entries.set(key, { name, value });
    }
  }

  /**
   * Merges headers into the bag; later values win
   */
  merge(headers: Record<string, string>): void {
    for (const [name, value] of Object.entries(headers)) {
      this.set(name, value);
    }
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  /**
   * Discards every header and starts over from the given set
   */
  reset(headers: Record<string, string> = {}): void {
    this.entries.clear();
    this.merge(headers);
  }

  /**
   * Snapshot as a plain object, in insertion order
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const { name, value } of this.entries.values()) {
      record[name] = value;
    }
    return record;
  }
}
