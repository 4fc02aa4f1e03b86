/**
 * Chess.tsx - Terminal chess against the engine
 *
 * Features:
 * - Level picker (1 easy, 2 medium, 3 hard) when no level is preselected
 * - Board drawn with chalk background colors in a choice of themes
 * - Last move highlighted; typing a source square marks its destinations
 * - Coordinate move entry ("e2e4") with ink-text-input
 * - Clocks for both sides, captured pieces, check/mate/stalemate status
 * - AI moves computed off the UI thread through ChessAI
 * - State file logging after every position change
 */

import React, { useState, useEffect, useCallback, useRef } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import chalk from 'chalk';
import { ChessAI } from '../../chess/ChessAI.js';
import { ChessEngine } from '../../chess/ChessEngine.js';
import { materialBalance } from '../../chess/ChessEvaluator.js';
import { describeStatus, logGameState } from '../../core/GameStateLogger.js';
import { FILES, PIECE_UNICODE } from '../../chess/types.js';
import type { Cell, ChessState, Color, DifficultyLevel } from '../../chess/types.js';
import {
  THEMES,
  destinationSquares,
  formatClock,
  lastMoveSquares,
  nextTheme,
} from './ChessView.js';
import type { BoardTheme, ThemeName } from './ChessView.js';

// =============================================================================
// Types
// =============================================================================

interface ChessProps {
  onExit: () => void;
  level?: DifficultyLevel;
  playerColor?: Color;
  useWorker?: boolean;
  theme?: ThemeName;
}

type Clocks = Record<Color, number>;

// =============================================================================
// Constants
// =============================================================================

const LEVEL_NAMES: Record<DifficultyLevel, string> = {
  1: 'Easy',
  2: 'Medium',
  3: 'Hard',
};

const MOVE_CHARS = /[^a-h1-8]/g;

const AI_MOVE_DELAY_MS = 300;

// =============================================================================
// Board
// =============================================================================

interface BoardProps {
  board: Cell[];
  flipped: boolean;
  highlights: Set<number>;
  hints: Set<number>;
  theme: BoardTheme;
}

function ChessBoard({ board, flipped, highlights, hints, theme }: BoardProps) {
  const order = flipped ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];

  const buildRow = (row: number): string => {
    const rank = 8 - row;
    let rowStr = chalk.cyan.bold(` ${rank} `);
    for (const col of order) {
      const square = row * 8 + col;
      const cell = board[square];
      const isLight = (row + col) % 2 === 0;
      const bg = hints.has(square)
        ? chalk.bgGreen
        : highlights.has(square)
          ? chalk.bgBlue
          : chalk.bgHex(isLight ? theme.light : theme.dark);
      const content = cell ? PIECE_UNICODE[cell.color][cell.type] : ' ';
      const fg = cell?.color === 'w' ? chalk.blueBright : chalk.red;
      rowStr += bg(fg(` ${content} `));
    }
    return rowStr + chalk.cyan.bold(` ${rank}`);
  };

  const fileLabels = chalk.cyan('   ' + order.map((col) => ` ${FILES[col]} `).join(''));

  return (
    <Box flexDirection="column">
      <Text>{fileLabels}</Text>
      {order.map((row) => (
        <Text key={row}>{buildRow(row)}</Text>
      ))}
      <Text>{fileLabels}</Text>
    </Box>
  );
}

// =============================================================================
// Info Panel
// =============================================================================

interface InfoProps {
  state: ChessState;
  clocks: Clocks;
  thinking: boolean;
  playerColor: Color;
}

function InfoPanel({ state, clocks, thinking, playerColor }: InfoProps) {
  const balance = materialBalance({ board: state.board, turn: state.turn });
  const pawns = balance / 100;

  return (
    <Box flexDirection="column" marginLeft={2} width={32}>
      <Box borderStyle="round" borderColor="cyan" paddingX={1} marginBottom={1}>
        <Text bold color="cyan">Level {state.level}: {LEVEL_NAMES[state.level]}</Text>
      </Box>

      <Text>Turn: <Text bold color={state.turn === 'w' ? 'whiteBright' : 'gray'}>
        {state.turn === 'w' ? '● White' : '● Black'}
      </Text>{state.turn === playerColor ? ' (you)' : ' (AI)'}</Text>

      {thinking && <Text color="yellow">AI thinking...</Text>}

      <Text>White {formatClock(clocks.w)}  Black {formatClock(clocks.b)}</Text>
      <Text>Material: <Text color={balance > 0 ? 'green' : balance < 0 ? 'red' : 'gray'}>
        {pawns >= 0 ? `+${pawns.toFixed(1)}` : pawns.toFixed(1)}
      </Text></Text>

      {state.isCheck && !state.isCheckmate && <Text color="red" bold>CHECK!</Text>}
      {state.isCheckmate && <Text color="red" bold>CHECKMATE! {state.turn === playerColor ? 'AI wins' : 'You win'}</Text>}
      {state.isStalemate && <Text color="yellow" bold>STALEMATE - Draw</Text>}

      <Box marginTop={1} flexDirection="column">
        <Text dimColor>Captured:</Text>
        <Text>White: {state.capturedPieces.white.map((p) => PIECE_UNICODE.b[p]).join('')}</Text>
        <Text>Black: {state.capturedPieces.black.map((p) => PIECE_UNICODE.w[p]).join('')}</Text>
      </Box>

      {state.lastMove && (
        <Box marginTop={1}>
          <Text color="blue">Last: <Text bold>{state.lastMove}</Text></Text>
        </Box>
      )}
    </Box>
  );
}

// =============================================================================
// Level Picker
// =============================================================================

function LevelPicker({ onPick }: { onPick: (level: DifficultyLevel) => void }) {
  useInput((input) => {
    if (input === '1') onPick(1);
    if (input === '2') onPick(2);
    if (input === '3') onPick(3);
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2}>
      <Text bold color="cyan">Choose a level</Text>
      <Text>  [1] {LEVEL_NAMES[1]}   - looks 2 plies ahead, blunders now and then</Text>
      <Text>  [2] {LEVEL_NAMES[2]} - looks 4 plies ahead</Text>
      <Text>  [3] {LEVEL_NAMES[3]}   - looks 6 plies ahead</Text>
    </Box>
  );
}

// =============================================================================
// Main Chess Component
// =============================================================================

const Chess: React.FC<ChessProps> = ({
  onExit,
  level: initialLevel,
  playerColor = 'w',
  useWorker = true,
  theme: initialTheme = 'classic',
}) => {
  const [level, setLevel] = useState<DifficultyLevel | null>(initialLevel ?? null);
  const [theme, setTheme] = useState<ThemeName>(initialTheme);

  // Engine
  const [engine] = useState(() => new ChessEngine({ level: initialLevel ?? 2 }));
  const [ai] = useState(() => ChessAI.fromLevel(initialLevel ?? 2, { useWorker }));

  // State
  const [gameState, setGameState] = useState<ChessState>(() => engine.getState());
  const [thinking, setThinking] = useState(false);
  const [clocks, setClocks] = useState<Clocks>({ w: 0, b: 0 });
  const [moveInput, setMoveInput] = useState('');
  const [error, setError] = useState<string | null>(null);

  // Bumped on every new game so late AI replies for an old game are dropped
  const gameId = useRef(0);

  const updateState = useCallback(() => {
    const state = engine.getState();
    setGameState(state);
    logGameState('Playing Chess', describeStatus(state), state);
  }, [engine]);

  const startGame = useCallback((next: DifficultyLevel) => {
    gameId.current++;
    engine.newGame(next);
    ai.setLevel(next);
    setLevel(next);
    setClocks({ w: 0, b: 0 });
    setMoveInput('');
    setError(null);
    setThinking(false);
    updateState();
  }, [engine, ai, updateState]);

  const exitGame = useCallback(() => {
    void ai.terminate().then(onExit, onExit);
  }, [ai, onExit]);

  // Unmounting by any route (Esc, Ctrl+C) stops the worker thread
  useEffect(() => () => {
    void ai.terminate();
  }, [ai]);

  // Clocks tick for the side to move
  useEffect(() => {
    if (level === null || gameState.isGameOver) return;
    const started = Date.now();
    const side = gameState.turn;
    const base = clocks[side];
    const timer = setInterval(() => {
      setClocks((prev) => ({ ...prev, [side]: base + Date.now() - started }));
    }, 250);
    return () => clearInterval(timer);
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [level, gameState]);

  // AI turn
  useEffect(() => {
    if (level === null || gameState.isGameOver || thinking) return;
    if (gameState.turn === playerColor) return;

    const id = gameId.current;
    const timer = setTimeout(() => {
      setThinking(true);
      void ai.getBestMove(engine.fen())
        .then((move) => {
          if (id !== gameId.current) return;
          if (move && !engine.applyAiMove(move)) {
            setError(`AI returned an unplayable move: ${move}`);
          }
          updateState();
        })
        .catch((err: unknown) => {
          setError(`AI error: ${err instanceof Error ? err.message : String(err)}`);
        })
        .finally(() => {
          if (id === gameId.current) setThinking(false);
        });
    }, AI_MOVE_DELAY_MS);
    return () => clearTimeout(timer);
  }, [level, gameState, thinking, playerColor, ai, engine, updateState]);

  // Log the opening position once
  useEffect(() => {
    if (level !== null) updateState();
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  useInput((input, key) => {
    if (key.escape) {
      exitGame();
      return;
    }
    if (level !== null && input === 'n') {
      startGame(level);
    }
    if (input === 't') {
      setTheme(nextTheme);
    }
  });

  const handleSubmit = useCallback((value: string) => {
    setMoveInput('');
    if (gameState.isGameOver) {
      setError('Game over - press N for a new game');
      return;
    }
    if (thinking || engine.turn() !== playerColor) {
      setError('Wait for the AI!');
      return;
    }
    if (!engine.applyPlayerMove(value)) {
      setError(`Illegal move: ${value || '(empty)'}`);
      return;
    }
    setError(null);
    updateState();
  }, [engine, gameState.isGameOver, thinking, playerColor, updateState]);

  if (level === null) {
    return <LevelPicker onPick={startGame} />;
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Box>
        <ChessBoard
          board={gameState.board}
          flipped={playerColor === 'b'}
          highlights={lastMoveSquares(gameState.history)}
          hints={gameState.turn === playerColor ? destinationSquares(gameState.legalMoves, moveInput) : new Set<number>()}
          theme={THEMES[theme]}
        />
        <InfoPanel state={gameState} clocks={clocks} thinking={thinking} playerColor={playerColor} />
      </Box>

      <Box marginTop={1}>
        <Text color="cyan">Move: </Text>
        <TextInput
          value={moveInput}
          onChange={(value) => setMoveInput(value.replace(MOVE_CHARS, '').slice(0, 4))}
          onSubmit={handleSubmit}
          placeholder="e2e4"
        />
      </Box>

      {error && <Text color="red">{error}</Text>}

      <Box marginTop={1}>
        <Text dimColor>[Enter] Play move  [N] New game  [T] Theme ({THEMES[theme].label})  [Esc] Quit</Text>
      </Box>
    </Box>
  );
};

export default Chess;
