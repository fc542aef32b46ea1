export { MemorySink } from './memorySink';
export {
  buildTestSettings,
  setupTestLogging,
  createTestApp,
  TestLogging,
  TEST_HOST,
  TEST_TIMESTAMP,
} from './testApp';
