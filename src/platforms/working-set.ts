import type { Platform } from './platform.js';

/**
 * Ordered, immutable set of platforms still in play for one orchestration
 * run. Stages never mutate it; they return a smaller copy.
 */
export class WorkingSet {
  private readonly members: readonly Platform[];

  private constructor(members: readonly Platform[]) {
    this.members = members;
  }

  static of(platforms: Iterable<Platform>): WorkingSet {
    const unique: Platform[] = [];
    for (const platform of platforms) {
      if (!unique.includes(platform)) unique.push(platform);
    }
    return new WorkingSet(unique);
  }

  get size(): number {
    return this.members.length;
  }

  isEmpty(): boolean {
    return this.members.length === 0;
  }

  has(platform: Platform): boolean {
    return this.members.includes(platform);
  }

  toArray(): Platform[] {
    return [...this.members];
  }

  without(removed: Iterable<Platform>): WorkingSet {
    const drop = new Set(removed);
    if (drop.size === 0) return this;
    return new WorkingSet(this.members.filter((platform) => !drop.has(platform)));
  }

  /** Keeps only members also present in `other`; never adds. */
  intersect(other: Iterable<Platform>): WorkingSet {
    const keep = new Set(other);
    return new WorkingSet(this.members.filter((platform) => keep.has(platform)));
  }
}
