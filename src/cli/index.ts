#!/usr/bin/env node

import { createCLI } from './cli.js';
import { logger } from '../utils/logger.js';

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Unexpected error', error);
    process.exit(1);
  });
