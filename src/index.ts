/**
 * Cubie-model engine for the 3x3x3 puzzle.
 *
 * @example
 * ```typescript
 * import { LogicalCube, Move } from 'cubie-engine';
 *
 * const cube = new LogicalCube({ seed: 42 });
 *
 * cube.on('solved', ({ moveCount }) => {
 *   console.log(`Solved after ${moveCount} moves`);
 * });
 *
 * const scramble = cube.scramble();
 * cube.applyMove(Move.R_PRIME);
 * cube.applyMoves("U2 F' D");
 * ```
 */

// Core types
export * from './engine/types';
export * from './engine/errors';
export * from './engine/moves';

// State and move tables
export { CubeState } from './engine/CubeState';
export { applyDefinition } from './engine/applyDefinition';
export { BASE_MOVES, MOVE_TABLE, buildMoveTable, derive, ensureInitialized, lookup } from './engine/MoveTable';

// Entry points
export { LogicalCube } from './engine/LogicalCube';
export type { CubeEvents, LogicalCubeOptions } from './engine/LogicalCube';
export { Scrambler } from './engine/Scrambler';

// Display projection
export * from './engine/facelets';

// Utilities
export { getInverseMove, invertSequence, simplifyMoveStack, simplifySequence } from './utils/cube';
export { createSeededRandom, getDailySeed } from './utils/scramble';
export type { RandomSource } from './utils/scramble';
export { Logger } from './utils/Logger';
export { loadConfig, DEFAULT_SCRAMBLE_LENGTH } from './config';
export type { CubeConfig } from './config';
