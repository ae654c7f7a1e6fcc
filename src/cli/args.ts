/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for the smoke runner and harness configuration.
 */

export interface HarnessArgs {
  /** Run browser in headless mode; undefined defers to the HEADLESS env var */
  headless?: boolean;

  /** Path to the Firefox binary */
  executablePath?: string;

  /** Protocol read timeout in ms */
  readTimeoutMs?: number;

  /** Directory downloads are saved to */
  downloadDir?: string;

  /** Keep local and session storage across resets */
  keepStorage: boolean;

  /** Keep cookies across resets */
  keepCookies: boolean;

  /** Page the smoke runner visits before resetting */
  url?: string;
}

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set([
  'headless',
  'executablePath',
  'readTimeout',
  'downloadDir',
  'keepStorage',
  'keepCookies',
  'url',
]);

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const withoutDashes = arg.slice(2);
  const baseName = withoutDashes.split('=')[0];
  return KNOWN_ARG_NAMES.has(baseName);
}

/**
 * Parse command-line arguments into HarnessArgs.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function parseArgs(argv: string[]): HarnessArgs {
  const args: HarnessArgs = {
    keepStorage: false,
    keepCookies: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--headless=false' || arg === '--headless=0') {
      args.headless = false;
    } else if (arg === '--headless=true' || arg === '--headless=1' || arg === '--headless') {
      args.headless = true;
    } else if (arg === '--keepStorage') {
      args.keepStorage = true;
    } else if (arg === '--keepCookies') {
      args.keepCookies = true;
    } else if (arg === '--executablePath' && argv[i + 1]) {
      args.executablePath = argv[++i];
    } else if (arg === '--readTimeout' && argv[i + 1]) {
      args.readTimeoutMs = Number(argv[++i]);
    } else if (arg === '--downloadDir' && argv[i + 1]) {
      args.downloadDir = argv[++i];
    } else if (arg === '--url' && argv[i + 1]) {
      args.url = argv[++i];
    } else if (!isKnownArg(arg)) {
      // Warn about unknown arguments to catch typos like --hedless
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}
