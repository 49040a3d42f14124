import type { PendingDecision } from '@core/interfaces/index.js';

import { redisConfig } from '@infra/redis/redis.config.js';

import { logger } from '@utils/logger.js';

import { decodeHandoff, encodeHandoff } from './handoff.codec.js';
import type { OfferResult, PendingDecisionStore } from './pending-decision.store.js';

const KEY = `${redisConfig.prefixes.pending}:decision`;

const LUA_OFFER = `
-- KEYS[1] = key, ARGV[1] = order id, ARGV[2] = json, ARGV[3] = ttl (0 keeps it)
local current = redis.call('GET', KEYS[1])
if current then
  local ok, obj = pcall(cjson.decode, current)
  if ok and obj['order_id'] == ARGV[1] then return 0 end
end
local ttl = tonumber(ARGV[3])
if ttl and ttl > 0 then
  redis.call('SET', KEYS[1], ARGV[2], 'EX', ttl)
else
  redis.call('SET', KEYS[1], ARGV[2])
end
return 1
`;

const LUA_TAKE = `
local current = redis.call('GET', KEYS[1])
if current then redis.call('DEL', KEYS[1]) end
return current
`;

function parse(raw: unknown): PendingDecision | null {
  if (typeof raw !== 'string') return null;
  try {
    return decodeHandoff(JSON.parse(raw));
  } catch {
    logger.warn('[relay] discarding corrupt pending decision');
    return null;
  }
}

/** The subset of the node-redis client the store uses. */
export interface PendingScriptClient {
  eval(script: string, options: { keys: string[]; arguments?: string[] }): Promise<unknown>;
  get(key: string): Promise<unknown>;
}

/**
 * Survives restarts of this process. The slot is kept until it is taken,
 * unless a TTL is configured.
 */
export class RedisPendingDecisionStore implements PendingDecisionStore {
  constructor(
    private readonly client: PendingScriptClient,
    private readonly ttlSeconds = redisConfig.pendingTtlSeconds,
  ) {
    if (ttlSeconds > 0) {
      logger.warn('[relay] pending decisions expire unseen after the configured TTL', { ttlSeconds });
    }
  }

  async offer(pending: PendingDecision): Promise<OfferResult> {
    const code = await this.client.eval(LUA_OFFER, {
      keys: [KEY],
      arguments: [pending.orderId, JSON.stringify(encodeHandoff(pending)), String(this.ttlSeconds)],
    });
    return code === 1 ? 'stored' : 'duplicate';
  }

  async take(): Promise<PendingDecision | null> {
    const raw = await this.client.eval(LUA_TAKE, { keys: [KEY] });
    return parse(raw);
  }

  async peek(): Promise<PendingDecision | null> {
    return parse(await this.client.get(KEY));
  }
}
