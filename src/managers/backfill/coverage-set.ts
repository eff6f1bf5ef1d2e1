/**
 * Coverage Set
 *
 * Set of calendar dates keyed by their YYYY-MM-DD string.
 */

import type { ShotDate } from "@ompd/types";
import { compareShotDates, shotDateKey } from "../../utils/shot-date";

export class CoverageSet {
  private readonly dates = new Map<string, ShotDate>();

  constructor(dates: Iterable<ShotDate> = []) {
    for (const date of dates) {
      this.add(date);
    }
  }

  add(date: ShotDate): this {
    this.dates.set(shotDateKey(date), date);
    return this;
  }

  has(date: ShotDate): boolean {
    return this.dates.has(shotDateKey(date));
  }

  get size(): number {
    return this.dates.size;
  }

  /**
   * Dates in this set and not in `other`
   */
  difference(other: CoverageSet): CoverageSet {
    return new CoverageSet([...this.dates.values()].filter((date) => !other.has(date)));
  }

  /**
   * Oldest first
   */
  sorted(): ShotDate[] {
    return [...this.dates.values()].sort(compareShotDates);
  }
}
