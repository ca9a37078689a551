#!/usr/bin/env node
/**
 * Grant Call ETL MCP Server - CLI Entry Point
 *
 * Usage:
 *   grant-call-etl                      # after npm install -g
 *   node dist/src/index.js              # direct invocation
 *
 * @module bin
 */

import './index.js';
