import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  // Prompt and menu tests fake the clock; put it back even if one threw early.
  vi.useRealTimers();
});
