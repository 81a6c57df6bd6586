import { afterEach, vi } from 'vitest';

// Restore spies (fetch, storage health checks) between tests
afterEach(() => {
  vi.restoreAllMocks();
});
