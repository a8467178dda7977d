#!/usr/bin/env node
/**
 * tg-recon - Main Entry Point
 */

import { main, reportExit } from './main.js';

await reportExit(main(process.argv), process);
