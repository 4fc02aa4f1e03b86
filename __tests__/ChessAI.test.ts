/**
 * AI Player Tests
 *
 * ChessAI request handling on the calling thread, the worker protocol
 * against an in-process worker, the fallback path, and engine-vs-engine
 * matches.
 */

import { EventEmitter } from 'events';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { ChessAI, ChessAIMatch, createChessAI, createChessAIMatch } from '../src/chess/ChessAI.js';
import type { SearchWorker } from '../src/chess/ChessAI.js';
import { ChessEngine } from '../src/chess/ChessEngine.js';
import { STARTING_FEN } from '../src/chess/types.js';
import type { AIConfig, WorkerRequest, WorkerResponse } from '../src/chess/types.js';

const ROOK_TAKES_QUEEN = '7k/8/8/3q4/8/8/8/K2R4 w - - 0 1';
const BLACK_MATED = '7k/6Q1/6K1/8/8/8/8/8 b - - 0 1';
const BLACK_STALEMATED = 'k7/8/1Q6/8/8/8/8/4K3 b - - 0 1';
const BACK_RANK_MATE = '6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1';

const steady = (): number => 0.99;

const NO_STATS = { nodes: 0, cacheHits: 0, cutoffs: 0, blunders: 0 };

/** Stands in for the worker thread; answers each search with `reply` */
class FakeWorker extends EventEmitter implements SearchWorker {
  events: string[] = [];
  messages: WorkerRequest[] = [];

  constructor(private reply: (id: number) => WorkerResponse) {
    super();
  }

  postMessage(message: WorkerRequest): void {
    this.events.push(`post:${message.type}`);
    this.messages.push(message);
    if (message.type === 'SEARCH') {
      const response = this.reply(message.id);
      setImmediate(() => this.emit('message', response));
    }
  }

  ref(): void {
    this.events.push('ref');
  }

  unref(): void {
    this.events.push('unref');
  }

  terminate(): Promise<number> {
    this.events.push('terminate');
    return Promise.resolve(0);
  }
}

class FakeWorkerAI extends ChessAI {
  constructor(private fake: FakeWorker, config: Partial<AIConfig>) {
    super({ ...config, useWorker: true });
  }

  protected override createWorker(): SearchWorker {
    return this.fake;
  }
}

const replyWith = (move: string | null) => (id: number): WorkerResponse =>
  ({ type: 'RESULT', id, move, stats: NO_STATS });

// =============================================================================
// ChessAI
// =============================================================================

describe('ChessAI', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should choose a move on the calling thread', async () => {
    const ai = new ChessAI({ level: 1, useWorker: false, random: steady });

    await expect(ai.getBestMove(ROOK_TAKES_QUEEN)).resolves.toBe('d1d5');
  });

  it('should resolve null when there is nothing to play', async () => {
    const ai = new ChessAI({ level: 1, useWorker: false, random: steady });

    await expect(ai.getBestMove(BLACK_MATED)).resolves.toBeNull();
    await expect(ai.getBestMove(BLACK_STALEMATED)).resolves.toBeNull();
    await expect(ai.getBestMove('not a fen')).resolves.toBeNull();
  });

  it('should answer queued requests in order', async () => {
    const ai = new ChessAI({ level: 1, useWorker: false, random: steady });

    const moves = await Promise.all([
      ai.getBestMove(ROOK_TAKES_QUEEN),
      ai.getBestMove(BACK_RANK_MATE),
    ]);

    expect(moves).toEqual(['d1d5', 'a1a8']);
  });

  it('should build from a level', () => {
    const ai = ChessAI.fromLevel(3, { useWorker: false });

    expect(ai.getConfig().level).toBe(3);
    expect(ai.getConfig().useWorker).toBe(false);
    expect(createChessAI().getConfig().level).toBe(2);
  });

  it('should change level', () => {
    const ai = createChessAI({ useWorker: false });
    ai.setLevel(1);
    expect(ai.getConfig().level).toBe(1);
  });

  it('should terminate cleanly without a worker', async () => {
    await expect(new ChessAI({ useWorker: false }).terminate()).resolves.toBeUndefined();
  });

  it('should fall back to the calling thread when the worker cannot run', async () => {
    // Under the test runner the compiled worker script does not exist
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const ai = new ChessAI({ level: 1, useWorker: true, random: steady });

    await expect(ai.getBestMove(ROOK_TAKES_QUEEN)).resolves.toBe('d1d5');
    await expect(ai.getBestMove(ROOK_TAKES_QUEEN)).resolves.toBe('d1d5');
    // The failed worker is not started again for the second move
    expect(errorSpy).toHaveBeenCalledTimes(1);

    await ai.terminate();
  }, 15000);
});

// =============================================================================
// Worker protocol
// =============================================================================

describe('ChessAI with a worker', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should draw blunders with the configured random source', async () => {
    const fake = new FakeWorker(replyWith('h2h4'));
    const ai = new FakeWorkerAI(fake, { level: 1, random: () => 0 });

    for (let i = 0; i < 5; i++) {
      await expect(ai.getBestMove(STARTING_FEN)).resolves.toBe('a2a3');
    }
    // Every draw hit before a worker was needed
    expect(fake.events).toEqual([]);
  });

  it('should send the search depth and hold the process only while searching', async () => {
    const fake = new FakeWorker(replyWith('d1d5'));
    const ai = new FakeWorkerAI(fake, { level: 1, random: steady });

    await expect(ai.getBestMove(ROOK_TAKES_QUEEN)).resolves.toBe('d1d5');

    expect(fake.messages).toEqual([{ type: 'SEARCH', id: 1, fen: ROOK_TAKES_QUEEN, depth: 2 }]);
    expect(fake.events).toEqual(['ref', 'post:SEARCH', 'unref']);
  });

  it('should release the worker after each of several searches', async () => {
    const fake = new FakeWorker(replyWith('d1d5'));
    const ai = new FakeWorkerAI(fake, { level: 2, random: steady });

    await ai.getBestMove(ROOK_TAKES_QUEEN);
    await ai.getBestMove(ROOK_TAKES_QUEEN);

    expect(fake.events).toEqual(['ref', 'post:SEARCH', 'unref', 'ref', 'post:SEARCH', 'unref']);
    expect(fake.messages.map((m) => (m.type === 'SEARCH' ? m.id : 0))).toEqual([1, 2]);
  });

  it('should search on the calling thread for good once the worker reports an error', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const fake = new FakeWorker((id) => ({ type: 'ERROR', id, error: 'out of memory' }));
    const ai = new FakeWorkerAI(fake, { level: 1, random: steady });

    await expect(ai.getBestMove(ROOK_TAKES_QUEEN)).resolves.toBe('d1d5');
    await expect(ai.getBestMove(BACK_RANK_MATE)).resolves.toBe('a1a8');

    expect(fake.events).toEqual(['ref', 'post:SEARCH', 'unref']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should clear the worker cache on a level change', async () => {
    const fake = new FakeWorker(replyWith('d1d5'));
    const ai = new FakeWorkerAI(fake, { level: 1, random: steady });

    await ai.getBestMove(ROOK_TAKES_QUEEN);
    ai.setLevel(3);

    expect(fake.messages[1]).toEqual({ type: 'CLEAR_CACHE' });
  });

  it('should stop the worker on terminate', async () => {
    const fake = new FakeWorker(replyWith('d1d5'));
    const ai = new FakeWorkerAI(fake, { level: 1, random: steady });

    await ai.getBestMove(ROOK_TAKES_QUEEN);
    await ai.terminate();

    expect(fake.events[fake.events.length - 1]).toBe('terminate');
  });
});

// =============================================================================
// ChessAIMatch
// =============================================================================

describe('ChessAIMatch', () => {
  it('should stop at the ply limit with a draw', () => {
    const record = new ChessAIMatch({ maxPlies: 10, random: () => 0 }).play();

    expect(record.startFen).toBe(STARTING_FEN);
    expect(record.moves).toHaveLength(10);
    expect(record.moves.slice(0, 2)).toEqual(['a2a3', 'b8a6']);
    expect(record.result).toBe('draw');
    expect(record.termination).toBe('max_plies');
    expect(record.whiteLevel).toBe(1);
    expect(record.blackLevel).toBe(1);
  });

  it('should only record legal moves', () => {
    const record = new ChessAIMatch({ maxPlies: 16, random: () => 0 }).play();
    const replay = new ChessEngine();

    for (const move of record.moves) {
      expect(replay.applyPlayerMove(move)).toBe(true);
    }
  });

  it('should end at once in a finished position', () => {
    const mated = createChessAIMatch({ startFen: BLACK_MATED }).play();
    expect(mated.moves).toEqual([]);
    expect(mated.result).toBe('white');
    expect(mated.termination).toBe('checkmate');

    const stalemated = createChessAIMatch({ startFen: BLACK_STALEMATED }).play();
    expect(stalemated.moves).toEqual([]);
    expect(stalemated.result).toBe('draw');
    expect(stalemated.termination).toBe('stalemate');
  });

  it('should finish a game by checkmate', () => {
    const record = new ChessAIMatch({ startFen: BACK_RANK_MATE, random: steady }).play();

    expect(record.moves).toEqual(['a1a8']);
    expect(record.result).toBe('white');
    expect(record.termination).toBe('checkmate');
  });

  it('should play nothing with a zero ply limit', () => {
    const record = new ChessAIMatch({ maxPlies: 0 }).play();
    expect(record.moves).toEqual([]);
    expect(record.termination).toBe('max_plies');
  });

  it('should start from the standard layout when the FEN is invalid', () => {
    const record = new ChessAIMatch({ startFen: 'not a fen', maxPlies: 0 }).play();
    expect(record.startFen).toBe(STARTING_FEN);
  });
});
