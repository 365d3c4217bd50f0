// Keep test output quiet; individual suites raise the level when they assert on logs
process.env.LOG_LEVEL = 'error'
