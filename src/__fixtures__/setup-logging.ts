import { configureLogging, createNoopLogger } from '../logging/logger.js'

// Keeps test output free of expected warnings.
configureLogging(createNoopLogger())
