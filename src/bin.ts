#!/usr/bin/env node
/**
 * Casefile Radar MCP Server - bin entry point
 *
 * Usage:
 *   casefile-radar-mcp                  # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
