/**
 * Gatehouse - Directory Module
 */

export { PostgresDirectoryService, createPostgresDirectory, toVerdict } from './postgres-directory.js';

export type { PostgresDirectoryOptions, StatusLookup } from './postgres-directory.js';

export type { AllowListStatus, DirectoryService, DirectoryVerdict } from './types.js';
