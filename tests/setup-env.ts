/**
 * Jest Environment Setup
 * Runs BEFORE test framework is installed
 */

// Set test environment variables before any config module is loaded.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.LOG_FILE;
delete process.env.BOARD_WIDTH;
delete process.env.BOARD_HEIGHT;
delete process.env.STACKBOARD_TRACE_TALLIES;
