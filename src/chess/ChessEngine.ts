/**
 * ChessEngine - Game session over the rules engine and searcher
 *
 * Owns one position, one result cache and one random source. Moves cross
 * this boundary as four-character coordinate strings ("e2e4"); there is no
 * promotion suffix because pawns always become queens.
 */

import { isInCheck } from './ChessAttacks.js';
import {
  algebraicToSquare,
  createInitialPosition,
  moveToString,
  positionFromFen,
  positionToFen,
  squareToAlgebraic,
} from './ChessBoard.js';
import { ResultCache } from './ChessCache.js';
import { generateLegalMoves, makeMove } from './ChessMoveGen.js';
import { ChessSearch } from './ChessSearch.js';
import { DEFAULT_ENGINE_CONFIG, DIFFICULTY_SETTINGS } from './types.js';
import type {
  CapturedPieces,
  Cell,
  ChessEngineConfig,
  ChessState,
  Color,
  DifficultyLevel,
  DifficultySettings,
  Move,
  MoveActor,
  Position,
} from './types.js';

export class ChessEngine {
  private config: ChessEngineConfig;
  private position: Position;
  private cache: ResultCache = new ResultCache();
  private search: ChessSearch;
  private level: DifficultyLevel;
  private capturedPieces: CapturedPieces = { white: [], black: [] };
  private moveHistory: string[] = [];
  private lastMove = '';

  constructor(config: Partial<ChessEngineConfig> = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.search = new ChessSearch(this.cache, this.config.random);
    this.level = this.config.level;
    this.position = (this.config.initialFen && positionFromFen(this.config.initialFen))
      || createInitialPosition();
  }

  // ===========================================================================
  // Game Lifecycle
  // ===========================================================================

  /**
   * Start over at `level`, from the standard layout or `fen`
   * @returns false (and the standard layout) if `fen` is not valid
   */
  newGame(level: DifficultyLevel, fen?: string): boolean {
    const loaded = fen ? positionFromFen(fen) : null;
    this.position = loaded || createInitialPosition();
    this.capturedPieces = { white: [], black: [] };
    this.moveHistory = [];
    this.lastMove = '';
    this.setLevel(level);
    return !fen || loaded !== null;
  }

  /** Change difficulty mid-game; cached scores are discarded */
  setLevel(level: DifficultyLevel): void {
    this.level = level;
    this.cache.clear();
  }

  getLevel(): DifficultyLevel {
    return this.level;
  }

  getSettings(): DifficultySettings {
    return DIFFICULTY_SETTINGS[this.level];
  }

  // ===========================================================================
  // Moves
  // ===========================================================================

  legalMoves(): string[] {
    return generateLegalMoves(this.position).map(moveToString);
  }

  /**
   * Play a move for the human side
   * @returns false, with the position untouched, unless `move` is exactly
   * four characters naming a legal move
   */
  applyPlayerMove(move: string): boolean {
    const found = this.findLegalMove(move);
    if (!found) return false;
    this.commit(found, 'player');
    return true;
  }

  /**
   * Play a move chosen outside this session (e.g. by a worker search)
   */
  applyAiMove(move: string): boolean {
    const found = this.findLegalMove(move);
    if (!found) return false;
    this.commit(found, 'ai');
    return true;
  }

  /**
   * Search at the session's difficulty and play the chosen move
   * @returns The move played, or null if the game is already over
   */
  computeAiMove(): string | null {
    const { depth, blunderProbability } = this.getSettings();
    const move = this.search.findBestMove(this.position, depth, blunderProbability);
    if (!move) return null;
    this.commit(move, 'ai');
    return moveToString(move);
  }

  private findLegalMove(move: string): Move | null {
    if (move.length !== 4) return null;
    const from = algebraicToSquare(move.slice(0, 2));
    const to = algebraicToSquare(move.slice(2, 4));
    if (from === -1 || to === -1) return null;

    return generateLegalMoves(this.position).find((m) => m.from === from && m.to === to) ?? null;
  }

  private commit(move: Move, actor: MoveActor): void {
    const mover = this.position.turn;
    makeMove(this.position, move);

    if (move.captured) {
      if (mover === 'w') {
        this.capturedPieces.white.push(move.captured.type);
      } else {
        this.capturedPieces.black.push(move.captured.type);
      }
    }

    const text = moveToString(move);
    this.moveHistory.push(text);
    this.lastMove = actor === 'player'
      ? `You: ${squareToAlgebraic(move.from)}-${squareToAlgebraic(move.to)}`
      : `AI: ${text}`;
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  inCheck(): boolean {
    return isInCheck(this.position, this.position.turn);
  }

  isCheckmate(): boolean {
    return this.inCheck() && generateLegalMoves(this.position).length === 0;
  }

  isStalemate(): boolean {
    return !this.inCheck() && generateLegalMoves(this.position).length === 0;
  }

  isGameOver(): boolean {
    return generateLegalMoves(this.position).length === 0;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /** Copy of the 64 cells in index order */
  boardSnapshot(): Cell[] {
    return this.position.board.slice();
  }

  turn(): Color {
    return this.position.turn;
  }

  fen(): string {
    return positionToFen(this.position);
  }

  getCapturedPieces(): CapturedPieces {
    return {
      white: [...this.capturedPieces.white],
      black: [...this.capturedPieces.black],
    };
  }

  /** Human-readable description of the last move, "" before the first */
  getLastMove(): string {
    return this.lastMove;
  }

  getHistory(): string[] {
    return [...this.moveHistory];
  }

  getSearch(): ChessSearch {
    return this.search;
  }

  getState(): ChessState {
    const legalMoves = this.legalMoves();
    const isCheck = this.inCheck();
    return {
      fen: this.fen(),
      board: this.boardSnapshot(),
      turn: this.position.turn,
      level: this.level,
      legalMoves,
      isCheck,
      isCheckmate: isCheck && legalMoves.length === 0,
      isStalemate: !isCheck && legalMoves.length === 0,
      isGameOver: legalMoves.length === 0,
      capturedPieces: this.getCapturedPieces(),
      lastMove: this.lastMove,
      history: this.getHistory(),
    };
  }
}

export function createChessEngine(config?: Partial<ChessEngineConfig>): ChessEngine {
  return new ChessEngine(config);
}
