/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
clrcall - resolve and invoke methods over a type catalog v${VERSION}

USAGE:
  clrcall <command> [options]

COMMANDS:
  types [pattern]                  List catalog types
  members <type> [pattern]         List constructors and methods of a type
  assignable <concrete> <generic>  Test assignability to a generic type
  call <type> <member> [args...]   Resolve and invoke a member

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Trace resolution steps
  -q, --quiet               Suppress warnings
  -c, --config <file>       Config file path (default: clrcall.json)
  --catalog <file>          Load a catalog (.yaml, .json, .js, .ts); repeatable

TYPES OPTIONS:
  -n, --namespace <ns>      Namespace pattern
  -a, --attribute <name>    Only types carrying the attribute

MEMBERS OPTIONS:
  -s, --style <style>       full, simple (default) or paramBlock
  -g, --generic-args <type> Generic argument for rendering; repeatable
  -a, --attribute <name>    Only members carrying the attribute
  -f, --force               Include accessor names (get_X, set_X, ...)
  --non-public              Include non-public members
  --static                  Only static members
  --instance                Only instance members
  --no-warn                 No warning for types without constructors

ASSIGNABLE OPTIONS:
  --strict                  Retry a closed target as its open definition

CALL OPTIONS:
  --new [arg]               Construct an instance first; repeat for more arguments
  --answer <n[,n]>          Answer the next choice (1-based); repeatable
  --input <text>            Answer the next typed prompt; repeatable

Arguments are literals (42, -1.5, true, null, "text", [1, 2], { a: 1 });
anything else is passed as text. Use -- before arguments that start with -.

EXAMPLES:
  clrcall types "I*" -n System
  clrcall members "List<int>" --style full
  clrcall assignable "List<int>" "IEnumerable\`1"
  clrcall call Math Max 3 5
  clrcall call Demo.Circle Area --new 2
  clrcall call --catalog shop.yaml Shop.Cart Total 3 --answer 1
`);
};
