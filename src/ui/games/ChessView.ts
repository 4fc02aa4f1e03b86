/**
 * ChessView - Display helpers for the chess screen
 *
 * Board themes, clock text and the squares to highlight, kept apart from
 * the ink component so they can be checked without rendering.
 */

import { algebraicToSquare } from '../../chess/ChessBoard.js';

// =============================================================================
// Themes
// =============================================================================

export type ThemeName = 'classic' | 'blue' | 'teal';

export interface BoardTheme {
  label: string;
  /** Background of light squares, as a hex color */
  light: string;
  dark: string;
}

export const THEME_NAMES: readonly ThemeName[] = ['classic', 'blue', 'teal'];

export const THEMES: Record<ThemeName, BoardTheme> = {
  classic: { label: 'Classic', light: '#F0D9B5', dark: '#B58863' },
  blue: { label: 'Blue', light: '#B4B4FF', dark: '#4646B4' },
  teal: { label: 'Teal', light: '#B9F5EB', dark: '#009B87' },
};

export function isThemeName(name: string): name is ThemeName {
  return THEME_NAMES.some((theme) => theme === name);
}

/** Theme after `current`, wrapping around */
export function nextTheme(current: ThemeName): ThemeName {
  const index = THEME_NAMES.indexOf(current);
  return THEME_NAMES[(index + 1) % THEME_NAMES.length];
}

// =============================================================================
// Clocks
// =============================================================================

export function formatClock(ms: number): string {
  const total = Math.floor(ms / 1000);
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

// =============================================================================
// Highlights
// =============================================================================

/** Squares of the last move in history */
export function lastMoveSquares(history: string[]): Set<number> {
  const last = history[history.length - 1];
  if (!last) return new Set();
  return new Set([algebraicToSquare(last.slice(0, 2)), algebraicToSquare(last.slice(2, 4))]);
}

/**
 * Where the piece on `entry` can go, once the move box holds exactly a
 * source square
 */
export function destinationSquares(legalMoves: string[], entry: string): Set<number> {
  if (entry.length !== 2 || algebraicToSquare(entry) === -1) return new Set();
  return new Set(
    legalMoves
      .filter((move) => move.startsWith(entry))
      .map((move) => algebraicToSquare(move.slice(2, 4))),
  );
}
