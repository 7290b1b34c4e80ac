export * from './types.js';
export * from './errors.js';
export * from './deck.js';
export * from './handEvaluator.js';
export * from './positions.js';
export * from './potAccountant.js';
export * from './actionValidator.js';
export * from './bettingRound.js';
export * from './settings.js';
export {
  createTable,
  startTable,
  startHand,
  applyAction,
  applyTimeout,
  pauseTable,
  resumeTable,
  isHandInProgress,
  getCurrentPots,
} from './gameEngine.js';
export type { HandOptions, NewTableSeat } from './gameEngine.js';
