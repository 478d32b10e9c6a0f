/**
 * Jest test setup file for shared infrastructure tests
 */

jest.setTimeout(30000);

// Clean up after each test
afterEach(() => {
  jest.clearAllMocks();
});
