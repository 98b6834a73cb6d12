// Keep test output readable; individual tests may raise the level.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
