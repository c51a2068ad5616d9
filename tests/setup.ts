// Global test setup for all test suites
import { logger } from '../src/core/utils/logger.js';

logger.silent = true;
