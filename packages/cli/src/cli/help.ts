/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
wrapgen - C# wrapper generator for IL2CPP metadata dumps v${VERSION}

USAGE:
  wrapgen <command> [dump] [options]

COMMANDS:
  generate [dump]           Write wrapper files (default dump: dump.cs)
  detect [dump]             List namespaces third-party detection would skip
  help                      Show help
  version                   Show version

OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file (default: wrapgen.json)
  -m, --mappings <file>     Deobfuscation mappings (default: mappings.json)
  -o, --out <dir>           Output directory
  --file-prefix <prefix>    Output file name prefix
  --no-auto-detect          Disable third-party namespace detection
  --report                  Print exclusion counts by reason

EXAMPLES:
  wrapgen generate dump.cs
  wrapgen generate dump.cs -o Generated --report
  wrapgen generate dump.cs -m mappings.json --file-prefix ModSDK
  wrapgen detect dump.cs -c wrapgen.json
`);
};
