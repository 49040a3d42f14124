import { config } from '../../config/env.config.js';

export const redisConfig = {
  pendingTtlSeconds: Number(config.PENDING_DECISION_TTL_SEC),
  prefixes: {
    pending: 'pending',
    bus: config.BUS_CHANNEL_PREFIX,
  },
} as const;
