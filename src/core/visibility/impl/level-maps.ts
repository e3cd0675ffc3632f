/**
 * Shared level accumulators.
 *
 * Both structures only ever grow their levels. Every update is a single
 * read-modify-write with no await in between, so concurrent tasks on the
 * event loop cannot interleave inside one update.
 *
 * @module
 */

import { AccessLevel, maxLevel } from "../models/access-level.js";

/**
 * Per-declaration accumulator shared by the parallel usage scans of one
 * declaration.
 */
export class LevelAccumulator {
  private _level: AccessLevel;
  private _foundUsage = false;
  private _saturated = false;
  private _sitesVisited = 0;

  constructor(seed: AccessLevel) {
    this._level = seed;
  }

  get level(): AccessLevel {
    return this._level;
  }

  get foundUsage(): boolean {
    return this._foundUsage;
  }

  /** Public has been reached; further sites cannot change the result */
  get saturated(): boolean {
    return this._saturated;
  }

  get sitesVisited(): number {
    return this._sitesVisited;
  }

  /**
   * Records that one usage site was seen.
   */
  visit(): void {
    this._sitesVisited++;
    this._foundUsage = true;
  }

  accumulate(level: AccessLevel): void {
    this._level = maxLevel(this._level, level);
    if (this._level === AccessLevel.Public) {
      this._saturated = true;
    }
  }
}

/**
 * Container to max-suggested-member-level map owned by one analysis run.
 */
export class ContainerLevelMap {
  private readonly levels = new Map<string, AccessLevel>();

  /**
   * Compare-and-max update for one container.
   *
   * @returns The container's level after the update
   */
  accumulate(containerId: string, level: AccessLevel): AccessLevel {
    const previous = this.levels.get(containerId);
    const next = previous === undefined ? level : maxLevel(previous, level);
    this.levels.set(containerId, next);
    return next;
  }

  get(containerId: string): AccessLevel | undefined {
    return this.levels.get(containerId);
  }
}
