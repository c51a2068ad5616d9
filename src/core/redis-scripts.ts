// Lua scripts for the Redis job repository
//
// Each state transition runs as one script so the capacity check, queue
// membership and job hash change together.

/**
 * KEYS: pending zset, processing set, sequence counter, job hash
 * ARGV: max queue size, job id, parameters json, submit time, source image (base64)
 * Returns the admission sequence number, 0 when full, -1 when the id exists.
 */
export const ADMIT_JOB_SCRIPT = `
if redis.call('EXISTS', KEYS[4]) == 1 then
  return -1
end
local occupied = redis.call('ZCARD', KEYS[1]) + redis.call('SCARD', KEYS[2])
if occupied >= tonumber(ARGV[1]) then
  return 0
end
local seq = redis.call('INCR', KEYS[3])
redis.call('HSET', KEYS[4],
  'id', ARGV[2],
  'status', 'queued',
  'parameters', ARGV[3],
  'submit_time', ARGV[4],
  'seq', tostring(seq),
  'source_image', ARGV[5])
redis.call('ZADD', KEYS[1], seq, ARGV[2])
return seq
`;

/**
 * KEYS: pending zset, processing set, dequeued sequence key
 * ARGV: job key prefix, start time, lease expiry, worker id
 * Returns the claimed job id, or false when the queue is empty.
 *
 * The job hash key is only known once the head is read, so it is built from
 * ARGV[1]. Every key must therefore live on one node; Redis Cluster is not
 * supported.
 */
export const CLAIM_JOB_SCRIPT = `
while true do
  local head = redis.call('ZRANGE', KEYS[1], 0, 0)
  if #head == 0 then
    return false
  end
  local id = head[1]
  local key = ARGV[1] .. id
  redis.call('ZREM', KEYS[1], id)
  local seq = redis.call('HGET', key, 'seq')
  if seq then
    redis.call('SET', KEYS[3], seq)
    redis.call('SADD', KEYS[2], id)
    redis.call('HSET', key,
      'status', 'processing',
      'start_time', ARGV[2],
      'lease_expires_at', ARGV[3],
      'worker_id', ARGV[4])
    return id
  end
end
`;

/**
 * KEYS: job hash
 * ARGV: worker id, lease expiry
 */
export const RENEW_LEASE_SCRIPT = `
if redis.call('HGET', KEYS[1], 'status') == 'processing'
  and redis.call('HGET', KEYS[1], 'worker_id') == ARGV[1] then
  redis.call('HSET', KEYS[1], 'lease_expires_at', ARGV[2])
  return 1
end
return 0
`;

/**
 * KEYS: job hash, processing set
 * ARGV: job id, terminal status, finish time, result ref, error, error kind,
 *       record ttl seconds
 */
export const FINISH_JOB_SCRIPT = `
if redis.call('HGET', KEYS[1], 'status') ~= 'processing' then
  return 0
end
redis.call('HSET', KEYS[1], 'status', ARGV[2], 'finish_time', ARGV[3])
if ARGV[4] ~= '' then
  redis.call('HSET', KEYS[1], 'result_ref', ARGV[4])
end
if ARGV[5] ~= '' then
  redis.call('HSET', KEYS[1], 'error', ARGV[5], 'error_kind', ARGV[6])
end
redis.call('HDEL', KEYS[1], 'source_image', 'lease_expires_at')
redis.call('SREM', KEYS[2], ARGV[1])
local ttl = tonumber(ARGV[7])
if ttl > 0 then
  redis.call('EXPIRE', KEYS[1], ttl)
end
return 1
`;
