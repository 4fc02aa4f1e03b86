/**
 * ChessCache - Search result memo
 *
 * Keys are exact: every cell, the side to move and the requested depth are
 * spelled out, so two entries never share a key by accident. An entry is
 * replaced on every store and is only served to a request whose depth does
 * not exceed the depth it was computed at. Nothing is ever evicted; owners
 * clear the cache when the difficulty changes.
 */

import { pieceSymbol } from './ChessBoard.js';
import type { CacheEntry, Position } from './types.js';

/**
 * Build the lookup key for `position` searched to `depth`
 * @example cacheKey(start, 3) // 'rnbqkbnrpppppppp................................PPPPPPPPRNBQKBNRw3'
 */
export function cacheKey(position: Position, depth: number): string {
  let key = '';
  for (const cell of position.board) {
    key += cell ? pieceSymbol(cell) : '.';
  }
  return `${key}${position.turn}${depth}`;
}

export class ResultCache {
  private entries: Map<string, CacheEntry> = new Map();

  /**
   * Stored score for `key` if it was computed at least `depth` deep
   */
  lookup(key: string, depth: number): number | null {
    const entry = this.entries.get(key);
    if (entry && entry.depth >= depth) return entry.score;
    return null;
  }

  /** Overwrite whatever `key` held */
  store(key: string, depth: number, score: number): void {
    this.entries.set(key, { depth, score });
  }

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
