process.env.NODE_ENV ??= 'test';
process.env.REDIS_URL ??= 'redis://localhost:6379';
process.env.QUEUE_ENABLED ??= 'false';
process.env.PENDING_STORE ??= 'memory';
