/**
 * ChessEvaluator - Static material evaluation
 *
 * Scores are centipawns from the point of view of the side to move, the
 * convention negamax relies on. There are no positional or mobility terms.
 */

import { PIECE_VALUES } from './types.js';
import type { Position } from './types.js';

/**
 * White material minus Black material, independent of the side to move
 */
export function materialBalance(position: Position): number {
  let sum = 0;
  for (const piece of position.board) {
    if (!piece) continue;
    sum += piece.color === 'w' ? PIECE_VALUES[piece.type] : -PIECE_VALUES[piece.type];
  }
  return sum;
}

/**
 * Material score for the side to move
 */
export function evaluate(position: Position): number {
  const sum = materialBalance(position);
  return position.turn === 'w' ? sum : -sum;
}
