#!/usr/bin/env node
/**
 * FeedSync CLI
 * feedsync <ozon|yandex-market> [--mode add-missing|sync]
 */

import 'dotenv/config';
import { runCli } from './run.js';

// Rate limiter intervals keep the event loop alive, so exit explicitly
runCli(process.argv.slice(2), process.env).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  }
);
