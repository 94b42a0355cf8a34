process.env.NODE_ENV = 'test';

// Keep per-file info logs out of test output; warnings still show.
process.env.LOG_LEVEL = 'warn';
