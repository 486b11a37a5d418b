// Keep Vitest runs quiet and skip the pretty-print transport worker.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
