/**
 * ChessMoveGen - Move generation and make/undo
 *
 * Pseudo-legal moves come out in square-scan order (a8 first). Legality is
 * always re-derived by playing each candidate and asking whether the mover's
 * king is attacked; no pin or check-ray bookkeeping is kept.
 */

import {
  DIAGONAL_DIRECTIONS,
  KING_OFFSETS,
  KNIGHT_OFFSETS,
  ORTHOGONAL_DIRECTIONS,
  PAWN_DIRECTION,
  isInCheck,
} from './ChessAttacks.js';
import { fileOf, isOnBoard, opposite, rankOf } from './ChessBoard.js';
import type { Color, Move, PieceType, Position, UndoRecord } from './types.js';

/** Pawns always promote to the strongest piece */
const PROMOTION_PIECE: PieceType = 'q';

const START_RANK: Record<Color, number> = { w: 6, b: 1 };
const PROMOTION_RANK: Record<Color, number> = { w: 0, b: 7 };

// =============================================================================
// Pseudo-Legal Generation
// =============================================================================

/**
 * Append a move unless it lands on a king. Legality filtering must never see
 * a position with a king already taken off the board.
 */
function addMove(moves: Move[], position: Position, from: number, to: number, promotion?: PieceType): void {
  const captured = position.board[to];
  if (captured && captured.type === 'k') return;

  const move: Move = { from, to, captured };
  if (promotion) move.promotion = promotion;
  moves.push(move);
}

function addPawnMoves(moves: Move[], position: Position, square: number, color: Color): void {
  const rank = rankOf(square);
  const file = fileOf(square);
  const dir = PAWN_DIRECTION[color];
  const ahead = rank + dir;
  if (!isOnBoard(ahead, file)) return;

  const promotion = ahead === PROMOTION_RANK[color] ? PROMOTION_PIECE : undefined;

  const single = ahead * 8 + file;
  if (!position.board[single]) {
    addMove(moves, position, square, single, promotion);

    const double = (rank + 2 * dir) * 8 + file;
    if (rank === START_RANK[color] && !position.board[double]) {
      addMove(moves, position, square, double);
    }
  }

  for (const df of [-1, 1]) {
    if (!isOnBoard(ahead, file + df)) continue;
    const target = ahead * 8 + file + df;
    const victim = position.board[target];
    if (victim && victim.color !== color) {
      addMove(moves, position, square, target, promotion);
    }
  }
}

function addStepMoves(
  moves: Move[],
  position: Position,
  square: number,
  color: Color,
  offsets: ReadonlyArray<readonly [number, number]>,
): void {
  const rank = rankOf(square);
  const file = fileOf(square);
  for (const [dr, df] of offsets) {
    if (!isOnBoard(rank + dr, file + df)) continue;
    const target = (rank + dr) * 8 + file + df;
    const occupant = position.board[target];
    if (!occupant || occupant.color !== color) {
      addMove(moves, position, square, target);
    }
  }
}

function addSlidingMoves(
  moves: Move[],
  position: Position,
  square: number,
  color: Color,
  directions: ReadonlyArray<readonly [number, number]>,
): void {
  const rank = rankOf(square);
  const file = fileOf(square);
  for (const [dr, df] of directions) {
    for (let dist = 1; dist < 8; dist++) {
      const r = rank + dr * dist;
      const f = file + df * dist;
      if (!isOnBoard(r, f)) break;
      const target = r * 8 + f;
      const occupant = position.board[target];
      if (!occupant) {
        addMove(moves, position, square, target);
        continue;
      }
      if (occupant.color !== color) {
        addMove(moves, position, square, target);
      }
      break;
    }
  }
}

/**
 * Geometrically valid moves for the side to move, ignoring self-check
 */
export function generateMoves(position: Position): Move[] {
  const moves: Move[] = [];
  const us = position.turn;

  for (let square = 0; square < 64; square++) {
    const piece = position.board[square];
    if (!piece || piece.color !== us) continue;

    switch (piece.type) {
      case 'p':
        addPawnMoves(moves, position, square, us);
        break;
      case 'n':
        addStepMoves(moves, position, square, us, KNIGHT_OFFSETS);
        break;
      case 'b':
        addSlidingMoves(moves, position, square, us, DIAGONAL_DIRECTIONS);
        break;
      case 'r':
        addSlidingMoves(moves, position, square, us, ORTHOGONAL_DIRECTIONS);
        break;
      case 'q':
        addSlidingMoves(moves, position, square, us, DIAGONAL_DIRECTIONS);
        addSlidingMoves(moves, position, square, us, ORTHOGONAL_DIRECTIONS);
        break;
      case 'k':
        addStepMoves(moves, position, square, us, KING_OFFSETS);
        break;
    }
  }

  return moves;
}

// =============================================================================
// Make / Undo
// =============================================================================

/**
 * Play `move` on `position` in place
 * @returns The record undoMove() needs to restore the position exactly
 */
export function makeMove(position: Position, move: Move): UndoRecord {
  const piece = position.board[move.from];
  position.board[move.to] = piece && move.promotion
    ? { type: move.promotion, color: piece.color }
    : piece;
  position.board[move.from] = null;
  position.turn = opposite(position.turn);
  return { move };
}

export function undoMove(position: Position, undo: UndoRecord): void {
  const { move } = undo;
  position.turn = opposite(position.turn);
  const piece = position.board[move.to];
  // A promoted piece goes back as the pawn it was
  position.board[move.from] = piece && move.promotion
    ? { type: 'p', color: piece.color }
    : piece;
  position.board[move.to] = move.captured;
}

// =============================================================================
// Legal Generation
// =============================================================================

/**
 * Pseudo-legal moves that do not leave the mover's king attacked. The
 * position is mutated while probing and restored before returning, so the
 * caller must hold it exclusively.
 */
export function generateLegalMoves(position: Position): Move[] {
  const mover = position.turn;
  const legal: Move[] = [];

  for (const move of generateMoves(position)) {
    const undo = makeMove(position, move);
    if (!isInCheck(position, mover)) {
      legal.push(move);
    }
    undoMove(position, undo);
  }

  return legal;
}

/** Does the side to move have no legal move at all? */
export function hasNoLegalMoves(position: Position): boolean {
  return generateLegalMoves(position).length === 0;
}
