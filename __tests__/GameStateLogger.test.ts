/**
 * State File Tests
 *
 * ASCII board rendering, status lines and the state file written for
 * outside observers.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { ChessEngine } from '../src/chess/ChessEngine.js';
import { createInitialPosition } from '../src/chess/ChessBoard.js';
import {
    clearStateFile,
    describeStatus,
    getStateFile,
    logGameState,
    renderAsciiBoard,
    setFileLoggingEnabled,
    setStateFile,
} from '../src/core/GameStateLogger.js';
import { STARTING_FEN } from '../src/chess/types.js';

const BORDER = '  +---+---+---+---+---+---+---+---+';
const FILE_LABELS = '    a   b   c   d   e   f   g   h';

describe('renderAsciiBoard', () => {
    it('should draw rank 8 first with uppercase White pieces', () => {
        const lines = renderAsciiBoard(createInitialPosition().board).split('\n');

        expect(lines[0]).toBe(FILE_LABELS);
        expect(lines[1]).toBe(BORDER);
        expect(lines[2]).toBe('8 | r | n | b | q | k | b | n | r | 8');
        expect(lines[3]).toBe(BORDER);
        expect(lines[4]).toBe('7 | p | p | p | p | p | p | p | p | 7');
        expect(lines[6]).toBe('6 | . | . | . | . | . | . | . | . | 6');
        expect(lines[16]).toBe('1 | R | N | B | Q | K | B | N | R | 1');
        expect(lines[18]).toBe(FILE_LABELS);
        expect(lines).toHaveLength(20);
    });
});

describe('describeStatus', () => {
    it('should count full moves and name the side to move', () => {
        const engine = new ChessEngine();
        expect(describeStatus(engine.getState())).toBe('White to move (Move #1)');

        engine.applyPlayerMove('e2e4');
        expect(describeStatus(engine.getState())).toBe('Black to move (Move #1)');

        engine.applyAiMove('e7e5');
        expect(describeStatus(engine.getState())).toBe('White to move (Move #2)');
    });

    it('should flag check', () => {
        const engine = new ChessEngine({ initialFen: '4k3/8/8/8/8/8/4q3/4K3 w - - 0 1' });
        expect(describeStatus(engine.getState())).toBe('White to move (Move #1) - CHECK!');
    });

    it('should announce the end of the game', () => {
        const mated = new ChessEngine({ initialFen: '7k/6Q1/6K1/8/8/8/8/8 b - - 0 1' });
        expect(describeStatus(mated.getState())).toBe('CHECKMATE! Black loses.');

        const stalemated = new ChessEngine({ initialFen: 'k7/8/1Q6/8/8/8/8/4K3 b - - 0 1' });
        expect(describeStatus(stalemated.getState())).toBe('STALEMATE - Draw');
    });
});

describe('State file', () => {
    let previousFile: string;
    let dir: string;
    let file: string;

    beforeAll(() => {
        previousFile = getStateFile();
    });

    afterAll(() => {
        setStateFile(previousFile);
    });

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chess-state-'));
        file = path.join(dir, 'state.txt');
        setStateFile(file);
        setFileLoggingEnabled(true);
    });

    afterEach(() => {
        setFileLoggingEnabled(true);
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should write the screen, status, board, controls and JSON state', () => {
        const state = new ChessEngine().getState();

        expect(logGameState('Playing Chess', describeStatus(state), state)).toBe(true);

        const content = fs.readFileSync(file, 'utf-8');
        const lines = content.split('\n');
        expect(lines[0]).toBe(`PROCESS ID: ${process.pid}`);
        expect(lines).toContain('CURRENT SCREEN: Playing Chess');
        expect(lines).toContain('STATUS: White to move (Move #1)');
        expect(lines).toContain('8 | r | n | b | q | k | b | n | r | 8');
        expect(lines).toContain('CONTROLS: Type a move like e2e4 and press Enter. N: new game. Esc: quit.');

        const json = content
            .split('--- STRUCTURED STATE (JSON) ---\n')[1]
            .split('\n--- END STRUCTURED STATE ---')[0];
        const structured: unknown = JSON.parse(json);
        expect(structured).toMatchObject({ fen: STARTING_FEN, turn: 'w', level: 2, isGameOver: false });
        expect(structured).not.toHaveProperty('board');
    });

    it('should use custom controls text', () => {
        const state = new ChessEngine().getState();
        logGameState('Playing Chess', 'ok', state, 'Press Q');

        expect(fs.readFileSync(file, 'utf-8').split('\n')).toContain('CONTROLS: Press Q');
    });

    it('should write nothing while disabled', () => {
        setFileLoggingEnabled(false);

        expect(logGameState('Playing Chess', 'ok', new ChessEngine().getState())).toBe(false);
        expect(clearStateFile()).toBe(false);
        expect(fs.existsSync(file)).toBe(false);
    });

    it('should mark the session as closed', () => {
        expect(clearStateFile()).toBe(true);
        expect(fs.readFileSync(file, 'utf-8').split('\n')[0]).toBe('PROCESS ID: TERMINATED');
    });

    it('should report a failed write', () => {
        setStateFile(path.join(dir, 'missing', 'state.txt'));
        expect(logGameState('Playing Chess', 'ok', new ChessEngine().getState())).toBe(false);
    });
});
