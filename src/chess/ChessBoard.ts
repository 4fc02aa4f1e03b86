/**
 * ChessBoard - Position construction, square naming and FEN conversion
 *
 * Square indices run rank * 8 + file with rank 0 at the top of the board
 * (the eighth rank), so algebraic rank digits are `8 - rankIndex`.
 */

import { Chess, validateFen } from 'chess.js';
import { FILES } from './types.js';
import type { Cell, Color, Move, Piece, PieceType, Position } from './types.js';

// =============================================================================
// Square Helpers
// =============================================================================

export function fileOf(square: number): number {
  return square & 7;
}

export function rankOf(square: number): number {
  return square >> 3;
}

export function isOnBoard(rank: number, file: number): boolean {
  return rank >= 0 && rank < 8 && file >= 0 && file < 8;
}

export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

/**
 * Convert a square index to algebraic notation
 * @example squareToAlgebraic(52) // 'e2'
 */
export function squareToAlgebraic(square: number): string {
  return `${FILES[fileOf(square)]}${8 - rankOf(square)}`;
}

/**
 * Convert algebraic notation to a square index, or -1 if `name` is not a
 * square from a1 to h8
 */
export function algebraicToSquare(name: string): number {
  if (name.length !== 2) return -1;
  const file = name.charCodeAt(0) - 97;
  const rank = 8 - (name.charCodeAt(1) - 48);
  if (!isOnBoard(rank, file)) return -1;
  return rank * 8 + file;
}

/** Four-character coordinate form, e.g. "e2e4" */
export function moveToString(move: Move): string {
  return squareToAlgebraic(move.from) + squareToAlgebraic(move.to);
}

// =============================================================================
// Piece Symbols
// =============================================================================

/** FEN letter for a piece (uppercase = white) */
export function pieceSymbol(piece: Piece): string {
  return piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
}

// =============================================================================
// Position Construction
// =============================================================================

export function createEmptyPosition(turn: Color = 'w'): Position {
  return { board: new Array<Cell>(64).fill(null), turn };
}

const BACK_RANK: PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];

/** Standard layout, White to move */
export function createInitialPosition(): Position {
  const position = createEmptyPosition('w');
  for (let file = 0; file < 8; file++) {
    position.board[file] = { type: BACK_RANK[file], color: 'b' };
    position.board[8 + file] = { type: 'p', color: 'b' };
    position.board[48 + file] = { type: 'p', color: 'w' };
    position.board[56 + file] = { type: BACK_RANK[file], color: 'w' };
  }
  return position;
}

export function clonePosition(position: Position): Position {
  return { board: position.board.slice(), turn: position.turn };
}

/**
 * Place (or with `null`, remove) a piece by algebraic square name
 * @returns false if the square name is malformed
 */
export function putPiece(position: Position, square: string, piece: Cell): boolean {
  const index = algebraicToSquare(square);
  if (index === -1) return false;
  position.board[index] = piece;
  return true;
}

// =============================================================================
// FEN
// =============================================================================

/**
 * Parse the piece placement and side to move of a FEN string. Castling and
 * en passant fields are accepted but play no part in this ruleset.
 * @returns null if chess.js rejects the FEN
 */
export function positionFromFen(fen: string): Position | null {
  if (!validateFen(fen).ok) return null;

  const chess = new Chess(fen);
  const board: Cell[] = chess
    .board()
    .flat()
    .map((cell) => (cell ? { type: cell.type, color: cell.color } : null));

  return { board, turn: chess.turn() };
}

/** Serialize a position; castling and en passant are always "-" */
export function positionToFen(position: Position): string {
  const rows: string[] = [];
  for (let rank = 0; rank < 8; rank++) {
    let row = '';
    let empty = 0;
    for (let file = 0; file < 8; file++) {
      const cell = position.board[rank * 8 + file];
      if (!cell) {
        empty++;
        continue;
      }
      if (empty > 0) {
        row += empty;
        empty = 0;
      }
      row += pieceSymbol(cell);
    }
    if (empty > 0) row += empty;
    rows.push(row);
  }
  return `${rows.join('/')} ${position.turn} - - 0 1`;
}
