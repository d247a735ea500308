#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { main } from '../release.js';

// Load environment variables
dotenv.config();

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Error:', error);
    process.exitCode = 1;
  });
