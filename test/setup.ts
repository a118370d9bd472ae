// Global setup - every test starts from a fresh environment-driven config,
// an empty warning accumulator and the discarding performance sink.
import { beforeEach } from 'vitest';
import { clearMediaWarnings, resetConfig, setPerformanceSink } from '../lib';

beforeEach(() => {
  resetConfig();
  clearMediaWarnings();
  setPerformanceSink(null);
});
