/**
 * Utils Module
 *
 * Terminal colors, request logging and the startup summary.
 */

export * from './colors';
export * from './logger';
export * from './startup';
