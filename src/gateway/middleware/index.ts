/**
 * Gatehouse - Gateway Middleware
 *
 * Barrel export file for all gateway middleware
 */

export * from './errorHandler.js';
export * from './requestId.js';
export * from './requestLogger.js';
