/**
 * Gatehouse - Directory Service Types
 * Read-only view of the IP and token allow-lists
 */

/** Stored status of an allow-list entry */
export type AllowListStatus = 'active' | 'inactive' | 'banned';

/**
 * Answer to a lookup. Banned entries report as inactive; only `active`
 * authorizes.
 */
export type DirectoryVerdict = 'active' | 'inactive' | 'not-found';

/**
 * Lookups reject with DirectoryUnavailableError when the directory cannot
 * answer, and with RequestAbortedError when the signal fires first.
 */
export interface DirectoryService {
  lookupIp(ip: string, signal?: AbortSignal): Promise<DirectoryVerdict>;
  lookupToken(token: string, signal?: AbortSignal): Promise<DirectoryVerdict>;
}
