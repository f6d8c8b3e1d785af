#!/usr/bin/env node
import { serveStdio } from '../mcp/run.js';

serveStdio().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
