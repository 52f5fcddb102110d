export { createMockLogger, type MockLogger } from './logger-mock.js';

export {
  TEST_LOG_GROUP_NAME,
  TEST_LOG_STREAM_NAME,
  TEST_EPOCH_MS,
  createTestEnvironment,
  createSteppingClock,
  createFailingSink,
} from './metric-fixtures.js';
