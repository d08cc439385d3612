#!/usr/bin/env node

// Dedicated entry point for `dastore-setup` and npx:
// it only runs the installer, never the CLI or the MCP server

import { main } from "./install.js";

main().then((code) => {
  process.exitCode = code;
});
