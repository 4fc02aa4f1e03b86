import fs from 'node:fs';
import path from 'node:path';
import { pieceSymbol } from '../chess/ChessBoard.js';
import type { Cell, ChessState } from '../chess/types.js';

// Configuration flags
let fileLoggingEnabled = true;
let stateFile = process.env.CHESS_STATE_FILE || path.join(process.cwd(), 'chess-state.txt');

/**
 * Enable or disable file logging
 */
export const setFileLoggingEnabled = (enabled: boolean): void => {
    fileLoggingEnabled = enabled;
};

export const setStateFile = (file: string): void => {
    stateFile = file;
};

export const getStateFile = (): string => stateFile;

/**
 * ASCII board, rank 8 at the top, '.' for empty squares
 */
export const renderAsciiBoard = (board: Cell[]): string => {
    const border = '  +---+---+---+---+---+---+---+---+\n';
    let visual = '    a   b   c   d   e   f   g   h\n' + border;
    for (let row = 0; row < 8; row++) {
        const rank = 8 - row;
        let line = `${rank} |`;
        for (let col = 0; col < 8; col++) {
            const cell = board[row * 8 + col];
            line += ` ${cell ? pieceSymbol(cell) : '.'} |`;
        }
        visual += `${line} ${rank}\n` + border;
    }
    return visual + '    a   b   c   d   e   f   g   h\n';
};

/**
 * One-line status for a game state
 */
export const describeStatus = (state: ChessState): string => {
    const turnStr = state.turn === 'w' ? 'White' : 'Black';
    if (state.isCheckmate) return `CHECKMATE! ${turnStr} loses.`;
    if (state.isStalemate) return 'STALEMATE - Draw';
    let status = `${turnStr} to move (Move #${Math.floor(state.history.length / 2) + 1})`;
    if (state.isCheck) status += ' - CHECK!';
    return status;
};

/**
 * Writes the current game state to the state file so outside tools can
 * follow the game.
 *
 * @param screenName - The name of the current screen (e.g., "Playing Chess")
 * @param status - A short status string
 * @param state - Game state to dump as board and JSON
 * @param controls - Instructions on how to control the game
 * @returns false if logging is disabled or the file could not be written
 */
export const logGameState = (
    screenName: string,
    status: string,
    state: ChessState,
    controls: string = 'Type a move like e2e4 and press Enter. N: new game. Esc: quit.',
): boolean => {
    if (!fileLoggingEnabled) return false;

    let content = `PROCESS ID: ${process.pid}\n`;
    content += `TIMESTAMP: ${Date.now()}\n`;
    content += `CURRENT SCREEN: ${screenName}\n`;
    content += `STATUS: ${status}\n`;
    content += `\nVISUAL STATE:\n`;
    content += renderAsciiBoard(state.board);
    content += `\nCONTROLS: ${controls}\n`;

    const { board: _board, ...structured } = state;
    content += `\n--- STRUCTURED STATE (JSON) ---\n`;
    content += JSON.stringify(structured, null, 2);
    content += `\n--- END STRUCTURED STATE ---\n`;

    return writeStateFile(content);
};

/**
 * Mark the state file as belonging to no running session
 */
export const clearStateFile = (): boolean => {
    if (!fileLoggingEnabled) return false;
    const content = `PROCESS ID: TERMINATED\nCURRENT SCREEN: Application Closed\nSTATUS: The chess session has exited.\n`;
    return writeStateFile(content);
};

const writeStateFile = (content: string): boolean => {
    try {
        fs.writeFileSync(stateFile, content, 'utf-8');
        return true;
    } catch {
        // Reported through the return value; the game loop keeps running
        return false;
    }
};
