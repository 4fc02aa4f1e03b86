import { parentPort } from 'worker_threads';
import { moveToString, positionFromFen } from '../ChessBoard.js';
import { ChessSearch } from '../ChessSearch.js';
import type { WorkerRequest, WorkerResponse } from '../types.js';

// Ensure we have a parent port to communicate with
if (!parentPort) {
  throw new Error('This file must be run as a worker thread');
}

const port = parentPort;

// One search instance for the life of the worker keeps its result cache
// warm across moves until the host asks for it to be cleared
const search = new ChessSearch();

const reply = (message: WorkerResponse): void => {
  port.postMessage(message);
};

port.on('message', (task: WorkerRequest) => {
  if (task.type === 'CLEAR_CACHE') {
    search.clearCache();
    return;
  }

  const position = positionFromFen(task.fen);
  if (!position) {
    reply({ type: 'ERROR', id: task.id, error: `Invalid FEN: ${task.fen}` });
    return;
  }

  // The search is synchronous but running in this separate thread
  search.resetStats();
  const move = search.findBestMove(position, task.depth, 0);

  reply({
    type: 'RESULT',
    id: task.id,
    move: move ? moveToString(move) : null,
    stats: search.getStats(),
  });
});
