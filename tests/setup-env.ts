import { beforeEach, afterEach } from 'vitest';

// Pin a dev-like environment so debug and warn output is not silenced by a
// shell that exports NODE_ENV=production.
const BASE = 'development';

beforeEach(() => {
  process.env.NODE_ENV = BASE;
  delete process.env.STACKABLE_SSR_DEBUG;
});

afterEach(() => {
  process.env.NODE_ENV = BASE;
});
