// Runs before every test file, ahead of the env module being loaded
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
process.env.DEFAULT_WORKERS = '2';
