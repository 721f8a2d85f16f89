// Increase timeout for all tests
jest.setTimeout(10000);

// Silence console logs during tests
beforeAll(() => {
  const originalConsoleLog = console.log;
  const originalConsoleWarn = console.warn;

  global.console.log = (...args) => {
    if (process.env.DEBUG) {
      originalConsoleLog(...args);
    }
  };

  global.console.warn = (...args) => {
    if (process.env.DEBUG) {
      originalConsoleWarn(...args);
    }
  };
});
