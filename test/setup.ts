/**
 * Global test setup: every test starts from a fresh registry
 */

import { afterEach } from 'vitest';
import { resetRegistry } from '../src/logger/logger-registry.js';

afterEach(() => {
  resetRegistry();
});
