/**
 * Gatehouse - Redis Lua Scripts for Rate Limiting
 * Atomic operations for distributed rate limiting
 */

// =============================================================================
// Fixed Window Counter Lua Script
// =============================================================================

/**
 * Fixed Window Counter Algorithm Lua Script
 *
 * Increments first, then decides. The window's TTL is set exactly once, by
 * the increment that creates the key; later increments reuse it. A key found
 * without an expiry is given one again so a counter can never live forever.
 *
 * KEYS[1] - The counter key
 * ARGV[1] - Window size (seconds)
 * ARGV[2] - Max requests per window
 *
 * Returns: [allowed (0/1), current_count, ttl_seconds]
 */
export const FIXED_WINDOW_SCRIPT = `
local counter_key = KEYS[1]
local window_seconds = tonumber(ARGV[1])
local max_requests = tonumber(ARGV[2])

local current = redis.call('INCR', counter_key)
if current == 1 then
  redis.call('EXPIRE', counter_key, window_seconds)
end

local ttl = redis.call('TTL', counter_key)
if ttl < 0 then
  ttl = window_seconds
  redis.call('EXPIRE', counter_key, ttl)
end

if current > max_requests then
  return {0, current, ttl}
end
return {1, current, ttl}
`;
