/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

export const formatHelp = (): string => `
metareflect - runtime class registry inspector v${VERSION}

USAGE:
  metareflect <command> [args] [options]

COMMANDS:
  classes                         List registered classes by hierarchy
  describe <class>                Show a class's methods and properties
  invoke <class> <method> [args]  Call a static method, or an instance
                                  method on a fresh instance
  eval <operator> <a> [b]         Evaluate a variant operator
  help                            Show this help
  version                         Show version

OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress informational output
  -c, --config <file>       Config file path (default: metareflect.json)

LITERALS:
  null, true, false         Null and Bool
  42, -7                    Int64
  2.5, 1e3, NaN             Double
  "42", hello               String

RUNNING:
  The workspace packages load from their TypeScript sources, so the built
  entry point runs under tsx:
    node --import tsx dist/cli/src/index.js <command>

EXAMPLES:
  metareflect classes
  metareflect describe ::Meta::ReferencedObject
  metareflect invoke ::Counter Add 5 --config ./metareflect.json
  metareflect eval + 2 3
  metareflect eval "<<" 1 65
  metareflect eval Negative 4
`;
