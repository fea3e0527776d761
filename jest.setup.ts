// Keep test output quiet; individual tests spy on the logger where they assert on it
process.env.LOG_LEVEL = 'error';
