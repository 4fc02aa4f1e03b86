/**
 * Chess Module
 *
 * Rules engine and move-search AI:
 * - Board representation, FEN and square naming
 * - Attack detection, pseudo-legal and legal move generation, make/undo
 * - Material evaluation
 * - Negamax alpha-beta search with a result cache and MVV-LVA ordering
 * - Game session with difficulty tiers
 * - Worker-thread host and engine-vs-engine matches
 *
 * @module chess
 */

// Board
export {
  algebraicToSquare,
  clonePosition,
  createEmptyPosition,
  createInitialPosition,
  fileOf,
  moveToString,
  opposite,
  pieceSymbol,
  positionFromFen,
  positionToFen,
  putPiece,
  rankOf,
  squareToAlgebraic,
} from './ChessBoard.js';

// Rules
export { isAttacked, isInCheck, kingSquare } from './ChessAttacks.js';
export {
  generateLegalMoves,
  generateMoves,
  makeMove,
  undoMove,
} from './ChessMoveGen.js';

// Evaluation
export { evaluate, materialBalance } from './ChessEvaluator.js';

// Search
export { ResultCache, cacheKey } from './ChessCache.js';
export {
  ChessSearch,
  divide,
  mvvLvaScore,
  orderMoves,
  perft,
  pickBlunder,
} from './ChessSearch.js';

// Session
export { ChessEngine, createChessEngine } from './ChessEngine.js';

// AI Player
export {
  ChessAI,
  ChessAIMatch,
  createChessAI,
  createChessAIMatch,
} from './ChessAI.js';

// Types
export type {
  AIConfig,
  CacheEntry,
  CapturedPieces,
  Cell,
  ChessEngineConfig,
  ChessState,
  Color,
  DifficultyLevel,
  DifficultySettings,
  GameRecord,
  GameTermination,
  MatchConfig,
  Move,
  MoveActor,
  Piece,
  PieceType,
  Position,
  SearchStats,
  UndoRecord,
  WorkerRequest,
  WorkerResponse,
} from './types.js';

// Constants
export {
  DEFAULT_AI_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_MATCH_CONFIG,
  DIFFICULTY_SETTINGS,
  FILES,
  INFINITY,
  MATE_SCORE,
  PIECE_UNICODE,
  PIECE_VALUES,
  STARTING_FEN,
  toDifficultyLevel,
} from './types.js';
