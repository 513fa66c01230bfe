#!/usr/bin/env node

// Loaded before the logger module reads LOG_LEVEL and LOG_PRETTY
import 'dotenv/config';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('proofline:', error);
    process.exit(1);
  });
