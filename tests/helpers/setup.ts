/**
 * Global test setup
 * Runs before all tests
 */

import { config } from 'dotenv';

import { logger } from '@utils/logger';

// Load test environment variables
config({ path: '.env.test' });

// Keep test output readable; warnings from expected failures are not interesting here
logger.setLevel('ERROR');
logger.setColors(false);

// Tests never reach real services; point everything at unroutable local defaults
process.env.BACKEND_URL = process.env.BACKEND_URL ?? 'http://localhost:5000';
process.env.OLLAMA_HOST = process.env.OLLAMA_HOST ?? 'http://localhost:11434';
