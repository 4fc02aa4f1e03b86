/**
 * ChessAttacks - Square attack detection and check queries
 *
 * All geometry works on (rank, file) deltas with explicit bounds checks, so
 * no offset can wrap from the h-file onto the a-file of the next rank.
 */

import { fileOf, isOnBoard, opposite, rankOf } from './ChessBoard.js';
import type { Color, PieceType, Position } from './types.js';

// =============================================================================
// Direction Tables ([rankDelta, fileDelta])
// =============================================================================

export const KNIGHT_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-2, -1], [-2, 1], [-1, -2], [-1, 2], [1, -2], [1, 2], [2, -1], [2, 1],
];

export const DIAGONAL_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [-1, 1], [1, -1], [1, 1],
];

export const ORTHOGONAL_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0], [0, -1], [0, 1], [1, 0],
];

export const KING_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [-1, 0], [-1, 1], [0, -1], [0, 1], [1, -1], [1, 0], [1, 1],
];

/** Rank step of a pawn move for each color (White moves toward rank 0) */
export const PAWN_DIRECTION: Record<Color, number> = { w: -1, b: 1 };

// =============================================================================
// Attack Detection
// =============================================================================

function holds(position: Position, rank: number, file: number, color: Color, type: PieceType): boolean {
  const piece = position.board[rank * 8 + file];
  return piece !== null && piece.color === color && piece.type === type;
}

/** First occupied square along a ray is a `by` slider of one of `types` */
function rayHits(
  position: Position,
  rank: number,
  file: number,
  directions: ReadonlyArray<readonly [number, number]>,
  by: Color,
  types: readonly PieceType[],
): boolean {
  for (const [dr, df] of directions) {
    for (let dist = 1; dist < 8; dist++) {
      const r = rank + dr * dist;
      const f = file + df * dist;
      if (!isOnBoard(r, f)) break;
      const piece = position.board[r * 8 + f];
      if (piece) {
        if (piece.color === by && types.includes(piece.type)) return true;
        break; // Blocked
      }
    }
  }
  return false;
}

/**
 * Can any piece of `by` reach `square`?
 */
export function isAttacked(position: Position, square: number, by: Color): boolean {
  const rank = rankOf(square);
  const file = fileOf(square);

  // An attacking pawn sits one rank behind the target, on an adjacent file
  const pawnRank = rank - PAWN_DIRECTION[by];
  for (const df of [-1, 1]) {
    if (isOnBoard(pawnRank, file + df) && holds(position, pawnRank, file + df, by, 'p')) {
      return true;
    }
  }

  for (const [dr, df] of KNIGHT_OFFSETS) {
    if (isOnBoard(rank + dr, file + df) && holds(position, rank + dr, file + df, by, 'n')) {
      return true;
    }
  }

  if (rayHits(position, rank, file, DIAGONAL_DIRECTIONS, by, ['b', 'q'])) return true;
  if (rayHits(position, rank, file, ORTHOGONAL_DIRECTIONS, by, ['r', 'q'])) return true;

  for (const [dr, df] of KING_OFFSETS) {
    if (isOnBoard(rank + dr, file + df) && holds(position, rank + dr, file + df, by, 'k')) {
      return true;
    }
  }

  return false;
}

// =============================================================================
// Check Queries
// =============================================================================

/** Index of `color`'s king, or -1 when it is not on the board */
export function kingSquare(position: Position, color: Color): number {
  for (let i = 0; i < 64; i++) {
    const piece = position.board[i];
    if (piece && piece.type === 'k' && piece.color === color) return i;
  }
  return -1;
}

/**
 * Is `color`'s king attacked? A board without that king reports false.
 */
export function isInCheck(position: Position, color: Color): boolean {
  const king = kingSquare(position, color);
  if (king === -1) return false;
  return isAttacked(position, king, opposite(color));
}
