#!/usr/bin/env node
/**
 * ecef-to-sez CLI
 *
 * Usage: ecef-to-sez o_x_km o_y_km o_z_km x_km y_km z_km
 */

import { runCli } from './run.js';

process.exit(runCli(process.argv.slice(2)));
