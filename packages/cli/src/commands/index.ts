/**
 * CLI Commands - Main Export
 * Lazy-loaded command registry for Gunshi
 */

import { define, lazy } from 'gunshi';
import { CLI_NAME } from '../utils/constants.js';

// Main command (shown when no subcommand is provided)
export const mainCommand = define({
  name: CLI_NAME,
  description: 'Download CHORDS telemetry portal data to per-instrument CSV files',
  run: (ctx) => {
    ctx.log('Use --help to see available commands');
  },
});

export const subCommands = {
  download: lazy(async () => (await import('./download.js')).downloadCommand, {
    name: 'download',
    description: 'Download instrument data into one CSV file per instrument',
  }),
  readme: lazy(async () => (await import('./readme.js')).readmeCommand, {
    name: 'readme',
    description: "Write a portal's units-of-measurement README.txt",
  }),
  portals: lazy(async () => (await import('./portals.js')).portalsCommand, {
    name: 'portals',
    description: 'List known portal names',
  }),
};
