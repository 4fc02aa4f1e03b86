#!/usr/bin/env node
/**
 * Sparring Chess CLI
 *
 * Usage: sparring-chess [command] [options]
 *
 * Commands:
 *   play             - Play against the engine in the terminal (default)
 *   selfplay         - Let the engine play itself and print the game
 *   perft <depth>    - Count move-tree leaves to check the move generator
 *   help             - Show help
 */

import React from 'react';
import { render } from 'ink';
import meow from 'meow';
import {
  ChessAIMatch,
  STARTING_FEN,
  createInitialPosition,
  divide,
  positionFromFen,
  toDifficultyLevel,
} from './chess/index.js';
import type { Color, Position } from './chess/index.js';
import { clearStateFile, setFileLoggingEnabled } from './core/GameStateLogger.js';
import Chess from './ui/games/Chess.js';
import { THEME_NAMES, isThemeName } from './ui/games/ChessView.js';

const cli = meow(`
  Usage
    $ sparring-chess [command] [options]

  Commands
    play             Play against the engine (default)
    selfplay         Engine vs engine, printed move by move
    perft <depth>    Count leaf positions of the legal move tree
    help             Show this help

  Options
    --level, -l <1-3>   Difficulty for play (asks when omitted)
    --color, -c <w|b>   Your color in play (default: w)
    --theme <name>      Board colors: classic, blue or teal (default: classic)
    --no-worker         Search on the UI thread instead of a worker
    --no-file           Do not write the state file
    --white <1-3>       White's level in selfplay (default: 1)
    --black <1-3>       Black's level in selfplay (default: 1)
    --plies <n>         Ply limit in selfplay (default: 200)
    --fen <fen>         Start position for selfplay and perft

  Environment
    CHESS_STATE_FILE    Path of the state file (default: ./chess-state.txt)

  Examples
    $ sparring-chess
    $ sparring-chess play --level 3 --color b
    $ sparring-chess play --theme teal
    $ sparring-chess selfplay --white 2 --black 1 --plies 60
    $ sparring-chess perft 4
`, {
  importMeta: import.meta,
  flags: {
    level: {
      type: 'number',
      shortFlag: 'l',
    },
    color: {
      type: 'string',
      shortFlag: 'c',
      default: 'w',
      choices: ['w', 'b'],
    },
    theme: {
      type: 'string',
      default: 'classic',
      choices: [...THEME_NAMES],
    },
    worker: {
      type: 'boolean',
      default: true,
    },
    file: {
      type: 'boolean',
      default: true,
    },
    white: {
      type: 'number',
      default: 1,
    },
    black: {
      type: 'number',
      default: 1,
    },
    plies: {
      type: 'number',
      default: 200,
    },
    fen: {
      type: 'string',
    },
  },
});

function loadStartPosition(): Position | null {
  if (!cli.flags.fen) return createInitialPosition();
  return positionFromFen(cli.flags.fen);
}

async function play(): Promise<void> {
  setFileLoggingEnabled(cli.flags.file);

  const playerColor: Color = cli.flags.color === 'b' ? 'b' : 'w';
  const level = cli.flags.level === undefined ? undefined : toDifficultyLevel(cli.flags.level);

  const instance = render(
    <Chess
      onExit={() => instance.unmount()}
      level={level}
      playerColor={playerColor}
      useWorker={cli.flags.worker}
      theme={isThemeName(cli.flags.theme) ? cli.flags.theme : 'classic'}
    />,
    { patchConsole: false },
  );

  await instance.waitUntilExit();
  clearStateFile();
}

function selfPlay(): void {
  const whiteLevel = toDifficultyLevel(cli.flags.white);
  const blackLevel = toDifficultyLevel(cli.flags.black);

  console.log(`\n♔ Self-play: White level ${whiteLevel} vs Black level ${blackLevel}\n`);

  const started = Date.now();
  const record = new ChessAIMatch({
    whiteLevel,
    blackLevel,
    maxPlies: cli.flags.plies,
    startFen: cli.flags.fen,
  }).play();

  const lines: string[] = [];
  for (let i = 0; i < record.moves.length; i += 2) {
    lines.push(`${i / 2 + 1}. ${record.moves.slice(i, i + 2).join(' ')}`);
  }
  console.log(lines.join('\n'));
  console.log(`\nResult: ${record.result} (${record.termination}) after ${record.moves.length} plies`);
  console.log(`Time: ${((Date.now() - started) / 1000).toFixed(1)}s`);
}

function runPerft(depthArg: string | undefined): void {
  const depth = Number.parseInt(depthArg ?? '', 10);
  if (!Number.isInteger(depth) || depth < 1) {
    console.error('❌ Please provide a depth of at least 1');
    process.exit(1);
  }

  const position = loadStartPosition();
  if (!position) {
    console.error(`❌ Invalid FEN: ${cli.flags.fen}`);
    process.exit(1);
  }

  console.log(`\nPerft ${depth} from ${cli.flags.fen ?? STARTING_FEN}\n`);

  const started = Date.now();
  let total = 0;
  for (const [move, nodes] of divide(position, depth)) {
    console.log(`  ${move}: ${nodes}`);
    total += nodes;
  }
  console.log(`\nNodes: ${total}`);
  console.log(`Time: ${Date.now() - started}ms`);
}

async function main(): Promise<void> {
  const [command = 'play', arg] = cli.input;

  switch (command) {
    case 'play':
      await play();
      break;
    case 'selfplay':
      if (cli.flags.fen && !positionFromFen(cli.flags.fen)) {
        console.error(`❌ Invalid FEN: ${cli.flags.fen}`);
        process.exit(1);
      }
      selfPlay();
      break;
    case 'perft':
      runPerft(arg);
      break;
    case 'help':
      cli.showHelp(0);
      break;
    default:
      console.error(`❌ Unknown command: ${command}`);
      cli.showHelp(1);
  }
}

main().catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
