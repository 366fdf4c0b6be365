/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
yangmodel - schema resolution for model generation v${VERSION}

USAGE:
  yangmodel <command> [options]

COMMANDS:
  resolve <bundle.json>     Resolve a schema bundle and print the model report
  help                      Show this message
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Only print errors
  -c, --config <file>       Config file path (default: yangmodel.json)

RESOLVE OPTIONS:
  -p, --root-package <pkg>  Root package of generated code
  --runtime-package <pkg>   Package of the built-in wrapper types
  --ignore-errors           Continue when modules are reported missing
  --imports                 Also resolve modules named by import statements
  -o, --out <file>          Write the report to a file instead of stdout

EXAMPLES:
  yangmodel resolve schema.json -p org.example.gen
  yangmodel resolve schema.json --imports -o build/model.json
`);
};
