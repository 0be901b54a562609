import type { GameLogEntry } from '../types.js';
import { EventBus } from './eventBus.js';

/**
 * Process-wide stream of log entries: phase transitions, clues, remarks,
 * votes, eliminations and game completions.
 *
 * The engine emits through the logger; the logger and the UI subscribe.
 */
export const eventBus = new EventBus<GameLogEntry>();

export { EventBus, type Unsubscribe } from './eventBus.js';
