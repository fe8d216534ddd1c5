/**
 * Readme Command
 * Writes a portal's units-of-measurement guide without downloading data
 */

import { getPortalProfile } from '@chords-export/shared';
import { define } from 'gunshi';
import ora from 'ora';
import { CLI_NAME, DEFAULT_OUTPUT_DIR } from '../utils/constants.js';
import { displaySuccess, displayWarning } from '../utils/display-helpers.js';
import { CLIValidationError, handleCommandError } from '../utils/error-handling.js';
import { writeReadme } from '../utils/readme-writer.js';

export async function executeReadme(
  portalName: string | undefined,
  outputDir: string,
  debug: boolean
): Promise<string> {
  if (!portalName) {
    throw new CLIValidationError('Portal name is required: --portal <name>');
  }

  const spinner = ora(`Writing units guide for ${portalName}...`).start();
  try {
    const profile = getPortalProfile(portalName);
    const filepath = await writeReadme(profile, outputDir);
    spinner.stop();

    if (profile.units.length === 0) {
      displayWarning(`${profile.name} has no units guide; wrote a placeholder README`);
    }
    displaySuccess(`Wrote ${filepath}`);
    return filepath;
  } catch (error) {
    handleCommandError(error, spinner, { failMessage: 'Could not write README', debug });
  }
}

export const readmeCommand = define({
  name: 'readme',
  description: "Write a portal's units-of-measurement README.txt",
  args: {
    portal: {
      type: 'string',
      short: 'p',
      description: 'Portal name, case sensitive',
    },
    out: {
      type: 'string',
      short: 'o',
      description: 'Output directory',
      default: DEFAULT_OUTPUT_DIR,
    },
    debug: {
      type: 'boolean',
      short: 'd',
      description: 'Enable debug output',
      default: false,
    },
  },
  examples: `# Units guide for the Trinidad portal
${CLI_NAME} readme --portal Trinidad --out ./data`,
  run: async (ctx) => {
    await executeReadme(ctx.values.portal, ctx.values.out, ctx.values.debug);
  },
});
