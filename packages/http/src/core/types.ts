// Pure types for functional core
// No classes, only data structures

import type { Dispatcher } from 'undici';

import type { Response } from '../response.js';

/**
 * How a hop ended when it produced no error: a final response, or a redirect
 * to follow.
 */
export type DispatchOutcome =
  | { kind: 'response'; response: Response }
  | { kind: 'redirect'; location: string; statusCode: number };

/** Broad class of a status code as the engine treats it */
export type StatusClass = 'success' | 'redirect' | 'failure';

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  dispatcher: Dispatcher;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
