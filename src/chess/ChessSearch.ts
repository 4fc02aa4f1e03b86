/**
 * ChessSearch - Negamax alpha-beta search
 *
 * Implements the move-choosing half of the engine:
 * - Fail-hard alpha-beta in negamax form
 * - Result cache lookup/store at every interior node
 * - MVV-LVA capture ordering
 * - Mate scores offset by remaining depth
 * - Root selection with deliberate blunders for the easy tier
 * - Extra depth once the material gap is decisive
 */

import { isInCheck } from './ChessAttacks.js';
import { moveToString } from './ChessBoard.js';
import { ResultCache, cacheKey } from './ChessCache.js';
import { evaluate } from './ChessEvaluator.js';
import { generateLegalMoves, makeMove, undoMove } from './ChessMoveGen.js';
import {
  DECISIVE_DEPTH_BONUS,
  DECISIVE_MATERIAL,
  INFINITY,
  MATE_SCORE,
  PIECE_VALUES,
} from './types.js';
import type { Move, Position, SearchStats } from './types.js';

// =============================================================================
// Move Ordering
// =============================================================================

/**
 * Most Valuable Victim - Least Valuable Attacker key; quiet moves score 0
 */
export function mvvLvaScore(position: Position, move: Move): number {
  if (!move.captured) return 0;
  const attacker = position.board[move.from];
  const attackerValue = attacker ? PIECE_VALUES[attacker.type] : 0;
  return PIECE_VALUES[move.captured.type] - attackerValue;
}

/**
 * Sort `moves` in place, best capture first. The sort is stable, so moves
 * with equal keys keep generation order.
 */
export function orderMoves(position: Position, moves: Move[]): Move[] {
  const keys = new Map<Move, number>();
  for (const move of moves) keys.set(move, mvvLvaScore(position, move));
  return moves.sort((a, b) => (keys.get(b) ?? 0) - (keys.get(a) ?? 0));
}

// =============================================================================
// ChessSearch Class
// =============================================================================

function emptyStats(): SearchStats {
  return { nodes: 0, cacheHits: 0, cutoffs: 0, blunders: 0 };
}

export class ChessSearch {
  private cache: ResultCache;
  private random: () => number;
  private stats: SearchStats = emptyStats();

  /**
   * @param cache - Memo shared by every search this instance runs
   * @param random - Uniform [0, 1) source for blunder draws
   */
  constructor(cache: ResultCache = new ResultCache(), random: () => number = Math.random) {
    this.cache = cache;
    this.random = random;
  }

  /**
   * Negamax score of `position` for the side to move, searched `depth` plies
   * within the window (alpha, beta). A score at or above beta is reported as
   * exactly beta.
   */
  search(position: Position, depth: number, alpha: number, beta: number): number {
    this.stats.nodes++;

    const key = cacheKey(position, depth);
    const cached = this.cache.lookup(key, depth);
    if (cached !== null) {
      this.stats.cacheHits++;
      return cached;
    }

    if (depth === 0) {
      return evaluate(position);
    }

    const moves = generateLegalMoves(position);

    if (moves.length === 0) {
      // Mated: the more depth left, the less negative
      const score = isInCheck(position, position.turn) ? -MATE_SCORE + depth : 0;
      this.cache.store(key, depth, score);
      return score;
    }

    orderMoves(position, moves);

    let bestScore = -INFINITY;

    for (const move of moves) {
      const undo = makeMove(position, move);
      const score = -this.search(position, depth - 1, -beta, -alpha);
      undoMove(position, undo);

      if (score >= beta) {
        this.stats.cutoffs++;
        this.cache.store(key, depth, beta);
        return beta;
      }
      if (score > bestScore) {
        bestScore = score;
      }
      if (score > alpha) {
        alpha = score;
      }
    }

    this.cache.store(key, depth, bestScore);
    return bestScore;
  }

  /**
   * Choose a root move searched `depth` plies deep. Before each root move is
   * searched it is returned outright with probability `blunderProbability`.
   * @returns null when the side to move has no legal move
   */
  selectMove(position: Position, depth: number, blunderProbability: number): Move | null {
    const moves = orderMoves(position, generateLegalMoves(position));
    if (moves.length === 0) return null;

    let best = moves[0];
    let bestScore = -INFINITY;
    const childDepth = Math.max(depth - 1, 0);

    for (const move of moves) {
      if (blunderProbability > 0 && this.random() < blunderProbability) {
        this.stats.blunders++;
        return move;
      }

      const undo = makeMove(position, move);
      const score = -this.search(position, childDepth, -INFINITY, INFINITY);
      undoMove(position, undo);

      if (score > bestScore) {
        bestScore = score;
        best = move;
      }
    }

    return best;
  }

  /**
   * Root depth for `position`: `baseDepth`, plus a bonus once either side is
   * up by roughly a queen and a rook
   */
  rootDepth(position: Position, baseDepth: number): number {
    return Math.abs(evaluate(position)) > DECISIVE_MATERIAL
      ? baseDepth + DECISIVE_DEPTH_BONUS
      : baseDepth;
  }

  /**
   * selectMove() at the material-adjusted root depth
   */
  findBestMove(position: Position, baseDepth: number, blunderProbability: number): Move | null {
    return this.selectMove(position, this.rootDepth(position, baseDepth), blunderProbability);
  }

  getStats(): SearchStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCache(): ResultCache {
    return this.cache;
  }
}

/**
 * The blunder draws of selectMove() without the search: one draw per ordered
 * root move, the first hit wins. Hosts that search elsewhere use this to
 * keep their own random source in charge.
 */
export function pickBlunder(moves: Move[], blunderProbability: number, random: () => number): Move | null {
  if (blunderProbability <= 0) return null;
  for (const move of moves) {
    if (random() < blunderProbability) return move;
  }
  return null;
}

// =============================================================================
// Perft (move generator verification)
// =============================================================================

/**
 * Count leaf nodes of the legal move tree `depth` plies deep
 */
export function perft(position: Position, depth: number): number {
  if (depth === 0) return 1;

  const moves = generateLegalMoves(position);
  if (depth === 1) return moves.length;

  let nodes = 0;
  for (const move of moves) {
    const undo = makeMove(position, move);
    nodes += perft(position, depth - 1);
    undoMove(position, undo);
  }
  return nodes;
}

/**
 * Perft split by root move, keyed by coordinate move string
 */
export function divide(position: Position, depth: number): Map<string, number> {
  const results = new Map<string, number>();
  if (depth < 1) return results;

  for (const move of generateLegalMoves(position)) {
    const undo = makeMove(position, move);
    results.set(moveToString(move), perft(position, depth - 1));
    undoMove(position, undo);
  }
  return results;
}
