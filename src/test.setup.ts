// Shared test setup for Vitest
// Suppress React act warnings in jsdom environment
// See: https://react.dev/reference/react/StrictMode#turn-off-warning-about-not-wrapping-updates-in-act
Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true });
