// Keep the service's structured log lines out of test output; anything else
// still reaches the console.
const isServiceLine = (args: unknown[]) =>
  typeof args[0] === "string" && args[0].includes('"service":"call-push"');

const originalConsoleLog = console.log.bind(console);
const originalConsoleWarn = console.warn.bind(console);
const originalConsoleError = console.error.bind(console);

console.log = (...args: unknown[]) => {
  if (isServiceLine(args)) return;
  originalConsoleLog(...args);
};

console.warn = (...args: unknown[]) => {
  if (isServiceLine(args)) return;
  originalConsoleWarn(...args);
};

console.error = (...args: unknown[]) => {
  if (isServiceLine(args)) return;
  originalConsoleError(...args);
};
