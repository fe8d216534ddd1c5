export const CLI_NAME = 'chords-export';
export const CLI_VERSION = '0.1.0';

export const DEFAULT_OUTPUT_DIR = './data';
export const README_FILENAME = 'README.txt';

export const NO_DATA_MESSAGE = 'No data was found for the specified time frame.\nCheck the CHORDS portal to verify.';

/** Environment variables that fill credentials missing from the request file and flags */
export const ENV_EMAIL = 'CHORDS_EMAIL';
export const ENV_API_KEY = 'CHORDS_API_KEY';
