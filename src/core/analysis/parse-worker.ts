/**
 * worker_threads entry point: parses the chunk of lines passed as
 * workerData and posts back the parsed entries.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { parseLogLines } from './line-parser.js';

const chunk: unknown = workerData;

if (parentPort && Array.isArray(chunk)) {
  const lines = chunk.filter((line): line is string => typeof line === 'string');
  parentPort.postMessage(parseLogLines(lines));
}
