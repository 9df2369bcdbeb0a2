// test/setup.ts

import { logger } from '../src/logger.js';

export const mochaHooks = {
  beforeAll(): void {
    logger.setConsoleOutput(false);
  },
};
