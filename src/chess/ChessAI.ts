/**
 * ChessAI - Off-thread move selection and engine-vs-engine play
 *
 * ChessAI runs root selection in a worker thread so a terminal UI keeps
 * drawing while the engine thinks. Requests are queued one at a time: the
 * worker's position and result cache are never touched by two searches at
 * once. If the worker cannot start or fails, the same search runs on the
 * calling thread against a cache owned by this object, and stays there.
 * Blunder draws always happen on the calling thread with the configured
 * random source; the worker only runs the blunder-free search.
 */

import { Worker } from 'worker_threads';
import { isInCheck } from './ChessAttacks.js';
import {
  createInitialPosition,
  moveToString,
  opposite,
  positionFromFen,
  positionToFen,
} from './ChessBoard.js';
import { ResultCache } from './ChessCache.js';
import { generateLegalMoves, hasNoLegalMoves, makeMove } from './ChessMoveGen.js';
import { ChessSearch, orderMoves, pickBlunder } from './ChessSearch.js';
import { DEFAULT_AI_CONFIG, DEFAULT_MATCH_CONFIG, DIFFICULTY_SETTINGS } from './types.js';
import type {
  AIConfig,
  Color,
  DifficultyLevel,
  GameRecord,
  MatchConfig,
  WorkerRequest,
  WorkerResponse,
} from './types.js';

interface PendingSearch {
  resolve: (move: string | null) => void;
  reject: (error: Error) => void;
}

/** The part of a worker_threads Worker that ChessAI talks to */
export interface SearchWorker {
  postMessage(message: WorkerRequest): void;
  on(event: 'message', listener: (msg: WorkerResponse) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'exit', listener: (code: number) => void): unknown;
  ref(): void;
  unref(): void;
  terminate(): Promise<number>;
}

// =============================================================================
// ChessAI Class
// =============================================================================

export class ChessAI {
  private config: AIConfig;
  private search: ChessSearch;
  private worker: SearchWorker | null = null;
  private workerFailed = false;
  private pending: Map<number, PendingSearch> = new Map();
  private nextRequestId = 1;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config?: Partial<AIConfig>) {
    this.config = { ...DEFAULT_AI_CONFIG, ...config };
    this.search = new ChessSearch(new ResultCache(), this.config.random);
  }

  static fromLevel(level: DifficultyLevel, overrides?: Partial<AIConfig>): ChessAI {
    return new ChessAI({ ...overrides, level });
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /** Change difficulty; every cached score is dropped */
  setLevel(level: DifficultyLevel): void {
    this.config = { ...this.config, level };
    this.clearCache();
  }

  getConfig(): AIConfig {
    return { ...this.config };
  }

  clearCache(): void {
    this.search.clearCache();
    this.post({ type: 'CLEAR_CACHE' });
  }

  // ===========================================================================
  // Move Selection
  // ===========================================================================

  /**
   * Choose a move for the side to move in `fen` at the configured level
   * @returns Coordinate move string, or null if there is no legal move
   */
  getBestMove(fen: string): Promise<string | null> {
    const run = this.queue.then(() => this.runSearch(fen));
    // The caller gets the rejection; later requests still run
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private async runSearch(fen: string): Promise<string | null> {
    const position = positionFromFen(fen);
    if (!position) return null;

    const moves = orderMoves(position, generateLegalMoves(position));
    if (moves.length === 0) return null;

    // Drawn here so config.random decides blunders on either thread
    const { depth, blunderProbability } = DIFFICULTY_SETTINGS[this.config.level];
    const blunder = pickBlunder(moves, blunderProbability, this.config.random);
    if (blunder) return moveToString(blunder);

    if (this.config.useWorker && !this.workerFailed) {
      try {
        return await this.runWorkerSearch(fen, depth);
      } catch (error) {
        this.workerFailed = true;
        console.error('Worker search failed, searching on the main thread from now on:', error);
      }
    }

    const move = this.search.findBestMove(position, depth, 0);
    return move ? moveToString(move) : null;
  }

  private runWorkerSearch(fen: string, depth: number): Promise<string | null> {
    return new Promise((resolve, reject) => {
      const id = this.nextRequestId++;
      const worker = this.getWorker();
      this.pending.set(id, { resolve, reject });
      // Holds the process open only while a search is outstanding
      worker.ref();
      worker.postMessage({ type: 'SEARCH', id, fen, depth });
    });
  }

  // ===========================================================================
  // Worker Management
  // ===========================================================================

  protected createWorker(): SearchWorker {
    return new Worker(new URL('./workers/ai.worker.js', import.meta.url));
  }

  /**
   * Get or create worker instance
   */
  private getWorker(): SearchWorker {
    if (!this.worker) {
      const worker = this.createWorker();

      worker.on('message', (msg) => this.handleMessage(msg));

      worker.on('error', (err) => {
        this.failPending(err);
        // Recreated on the next request
        void worker.terminate();
        if (this.worker === worker) this.worker = null;
      });

      worker.on('exit', (code) => {
        if (code !== 0) {
          this.failPending(new Error(`Chess AI worker stopped with exit code ${code}`));
        }
        if (this.worker === worker) this.worker = null;
      });

      this.worker = worker;
    }
    return this.worker;
  }

  private handleMessage(msg: WorkerResponse): void {
    const request = this.pending.get(msg.id);
    if (!request) return;
    this.pending.delete(msg.id);
    if (this.pending.size === 0) this.worker?.unref();

    if (msg.type === 'RESULT') {
      request.resolve(msg.move);
    } else {
      request.reject(new Error(msg.error));
    }
  }

  private failPending(error: Error): void {
    for (const request of this.pending.values()) {
      request.reject(error);
    }
    this.pending.clear();
  }

  private post(message: WorkerRequest): void {
    this.worker?.postMessage(message);
  }

  /** Stop the worker thread, if one was started */
  async terminate(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (worker) await worker.terminate();
  }
}

export function createChessAI(config?: Partial<AIConfig>): ChessAI {
  return new ChessAI(config);
}

// =============================================================================
// ChessAIMatch - Engine vs Engine
// =============================================================================

export class ChessAIMatch {
  private config: MatchConfig;

  constructor(config?: Partial<MatchConfig>) {
    this.config = { ...DEFAULT_MATCH_CONFIG, ...config };
  }

  /**
   * Play one game to mate, stalemate or the ply limit. Each side searches
   * with its own result cache.
   */
  play(): GameRecord {
    const { whiteLevel, blackLevel, maxPlies, startFen, random } = this.config;
    const position = (startFen && positionFromFen(startFen)) || createInitialPosition();
    const levels: Record<Color, DifficultyLevel> = { w: whiteLevel, b: blackLevel };
    const searches: Record<Color, ChessSearch> = {
      w: new ChessSearch(new ResultCache(), random),
      b: new ChessSearch(new ResultCache(), random),
    };

    const record: GameRecord = {
      startFen: positionToFen(position),
      moves: [],
      result: 'draw',
      termination: 'max_plies',
      whiteLevel,
      blackLevel,
    };

    for (;;) {
      const side = position.turn;

      if (hasNoLegalMoves(position)) {
        if (isInCheck(position, side)) {
          record.result = opposite(side) === 'w' ? 'white' : 'black';
          record.termination = 'checkmate';
        } else {
          record.termination = 'stalemate';
        }
        return record;
      }

      if (record.moves.length >= maxPlies) return record;

      const { depth, blunderProbability } = DIFFICULTY_SETTINGS[levels[side]];
      const move = searches[side].findBestMove(position, depth, blunderProbability);
      if (!move) return record;

      makeMove(position, move);
      record.moves.push(moveToString(move));
    }
  }
}

export function createChessAIMatch(config?: Partial<MatchConfig>): ChessAIMatch {
  return new ChessAIMatch(config);
}
