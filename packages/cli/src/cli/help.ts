/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
mapweave - mapper implementation generator v${VERSION}

USAGE:
  mapweave <command> [file] [options]

COMMANDS:
  generate <file.ts>        Write the implementation of every @mapper in file
  check <file.ts>           Report diagnostics without writing anything
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Only print errors
  -c, --config <file>       Config file path (default: mapweave.json)

GENERATE/CHECK OPTIONS:
  -o, --out <dir>           Output directory (default: beside the source file)
  --null-value-strategy <s> propagate or mapToDefault
  --unmapped-target-policy <p>
                            ignore, warn or error

EXAMPLES:
  mapweave generate src/user-mapper.ts
  mapweave generate src/user-mapper.ts --out src/generated
  mapweave check src/user-mapper.ts --unmapped-target-policy error
`);
};
