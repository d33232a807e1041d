/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

export const HELP_TEXT = `
Typeforge - type manifest loader and inspector v${VERSION}

USAGE:
  typeforge <command> [manifests...] [options]

COMMANDS:
  inspect [manifests...]    Load manifests and describe their types
  check [manifests...]      Load manifests and build every declared type
  help                      Show this message
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Log informational diagnostics
  -q, --quiet               Only log errors
  -c, --config <file>       Config file path (default: typeforge.json)

INSPECT OPTIONS:
  -t, --type <name>         Describe one type by qualified name
  --json                    Print the report as JSON

Manifests named on the command line replace the ones listed in
typeforge.json. The log level can also be set with TYPEFORGE_LOG_LEVEL.

EXAMPLES:
  typeforge check
  typeforge inspect manifests/zoo.json
  typeforge inspect --type "Zoo.Box\`1[[System.Int32]]" --json
`;
