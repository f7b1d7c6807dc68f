export { TEST_NOW, TestHarness, createTestApp, createTestContext } from './testApp';
export { FailingBlobStore } from './failingStore';
