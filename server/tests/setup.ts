/**
 * Jest Test Setup
 *
 * This file runs before all tests. It loads environment variables
 * and performs any necessary global setup.
 */

import 'dotenv/config';

// Set test environment
process.env.NODE_ENV = 'test';

// Keep stage summaries out of test output
process.env.LOG_LEVEL = 'error';

// Global error handlers for unhandled rejections
process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection in test:', reason);
});
