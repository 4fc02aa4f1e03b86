/**
 * Chess Module Type Definitions
 *
 * Shared types and constants for the rules engine, the searcher and the
 * session object that drives them.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** One board square: a piece or empty */
export type Cell = Piece | null;

// =============================================================================
// Board Representation
// =============================================================================

/**
 * Board state. `board` has 64 cells indexed rank * 8 + file, where rank 0 is
 * the eighth rank (Black's back rank in the initial layout) and file 0 is the
 * a-file.
 */
export interface Position {
  board: Cell[];
  turn: Color;
}

// =============================================================================
// Move Representation
// =============================================================================

export interface Move {
  /** Source square index (0-63) */
  from: number;
  /** Target square index (0-63) */
  to: number;
  /** Occupant of the target square when the move was generated */
  captured: Cell;
  /** Piece type promoted to (always a queen for this ruleset) */
  promotion?: PieceType;
}

/** Everything needed to take back one makeMove() */
export interface UndoRecord {
  move: Move;
}

// =============================================================================
// Search Types
// =============================================================================

/** Result cache entry */
export interface CacheEntry {
  /** Depth the score was computed at */
  depth: number;
  score: number;
}

/** Counters collected while searching */
export interface SearchStats {
  /** search() invocations, cache hits included */
  nodes: number;
  cacheHits: number;
  cutoffs: number;
  /** Root moves returned without searching */
  blunders: number;
}

// =============================================================================
// Game State
// =============================================================================

/** Difficulty tiers exposed to players */
export type DifficultyLevel = 1 | 2 | 3;

export interface DifficultySettings {
  /** Root search depth in plies */
  depth: number;
  /** Chance of returning each root move unsearched */
  blunderProbability: number;
}

/** Captured pieces tracking */
export interface CapturedPieces {
  white: PieceType[];  // Pieces captured BY white (black's pieces)
  black: PieceType[];  // Pieces captured BY black (white's pieces)
}

/** Who made a move, for history and display */
export type MoveActor = 'player' | 'ai';

/** Snapshot of a session for UI and logging */
export interface ChessState {
  fen: string;
  board: Cell[];
  turn: Color;
  level: DifficultyLevel;
  legalMoves: string[];
  isCheck: boolean;
  isCheckmate: boolean;
  isStalemate: boolean;
  isGameOver: boolean;
  capturedPieces: CapturedPieces;
  lastMove: string;
  history: string[];
}

export type GameTermination = 'checkmate' | 'stalemate' | 'max_plies';

/** Outcome of an engine-vs-engine game */
export interface GameRecord {
  startFen: string;
  moves: string[];
  result: 'white' | 'black' | 'draw';
  termination: GameTermination;
  whiteLevel: DifficultyLevel;
  blackLevel: DifficultyLevel;
}

// =============================================================================
// Worker Protocol
// =============================================================================

/** Blunders are drawn by the host, so a worker search never blunders */
export type WorkerRequest =
  | { type: 'SEARCH'; id: number; fen: string; depth: number }
  | { type: 'CLEAR_CACHE' };

export type WorkerResponse =
  | { type: 'RESULT'; id: number; move: string | null; stats: SearchStats }
  | { type: 'ERROR'; id: number; error: string };

// =============================================================================
// Configuration
// =============================================================================

export interface ChessEngineConfig {
  level: DifficultyLevel;
  /** Starting position; the standard layout when omitted or invalid */
  initialFen?: string;
  /** Uniform [0, 1) source used for blunder draws */
  random: () => number;
}

export interface MatchConfig {
  whiteLevel: DifficultyLevel;
  blackLevel: DifficultyLevel;
  /** Stop and call the game drawn after this many plies */
  maxPlies: number;
  startFen?: string;
  random: () => number;
}

export interface AIConfig {
  level: DifficultyLevel;
  /** Search in a worker thread instead of the calling thread */
  useWorker: boolean;
  /** Blunder draws, on the calling thread whichever side searches */
  random: () => number;
}

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w - - 0 1';

/** Material values in centipawns */
export const PIECE_VALUES: Record<PieceType, number> = {
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 20000,
};

/** Base score for the side to move being mated; remaining depth is added */
export const MATE_SCORE = 100000;

/** Wider than any score search() can return */
export const INFINITY = 1000000000;

/** |evaluation| beyond which the root search goes deeper (about Q + R) */
export const DECISIVE_MATERIAL = 1500;

/** Plies added at the root once the material gap is decisive */
export const DECISIVE_DEPTH_BONUS = 2;

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export const DIFFICULTY_SETTINGS: Record<DifficultyLevel, DifficultySettings> = {
  1: { depth: 2, blunderProbability: 0.35 },
  2: { depth: 4, blunderProbability: 0.0 },
  3: { depth: 6, blunderProbability: 0.0 },
};

export const DEFAULT_ENGINE_CONFIG: ChessEngineConfig = {
  level: 2,
  random: Math.random,
};

export const DEFAULT_MATCH_CONFIG: MatchConfig = {
  whiteLevel: 1,
  blackLevel: 1,
  maxPlies: 200,
  random: Math.random,
};

export const DEFAULT_AI_CONFIG: AIConfig = {
  level: 2,
  useWorker: true,
  random: Math.random,
};

/** Unicode glyphs for captured-piece and board display */
export const PIECE_UNICODE: Record<Color, Record<PieceType, string>> = {
  w: { k: '♔', q: '♕', r: '♖', b: '♗', n: '♘', p: '♙' },
  b: { k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟' },
};

/**
 * Map any requested level onto a supported tier; anything above 2 plays at
 * the strongest tier.
 */
export function toDifficultyLevel(level: number): DifficultyLevel {
  if (level <= 1) return 1;
  if (level === 2) return 2;
  return 3;
}
