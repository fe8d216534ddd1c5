/**
 * Portals Command
 * Lists the portals the downloader knows about
 */

import { listPortals } from '@chords-export/shared';
import { define } from 'gunshi';
import { displayFooter, displayHeader, displayTable } from '../utils/display-helpers.js';

export function portalRows(): string[][] {
  return listPortals().map((portal) => [
    portal.name,
    portal.columnOrder.length > 0 ? `${portal.columnOrder.length} fields` : 'discovery order',
    portal.units.length > 0 ? `${portal.units.length} entries` : 'not available',
  ]);
}

export const portalsCommand = define({
  name: 'portals',
  description: 'List known portal names with their column ordering and units guide',
  args: {
    json: {
      type: 'boolean',
      description: 'Print as JSON',
      default: false,
    },
  },
  run: (ctx) => {
    if (ctx.values.json) {
      const portals = listPortals().map((portal) => ({
        name: portal.name,
        columnOrder: portal.columnOrder,
        units: portal.units,
      }));
      console.log(JSON.stringify(portals, null, 2));
      return;
    }

    displayHeader('CHORDS Portals');
    displayTable(['Portal', 'Column order', 'Units guide'], portalRows());
    displayFooter();
  },
});
