#!/usr/bin/env node
// pattern: Imperative Shell

import { isNonInteractiveEnvironment, rootCommand } from "./cli/index.js";
import { initializeLogger } from "./logger/index.js";

// Settings errors raised before the preAction hook still need a logger;
// the hook re-initializes it from the command-line flags
const nonInteractive = isNonInteractiveEnvironment();
initializeLogger(nonInteractive ? "json" : "nice", nonInteractive);

await rootCommand.parseAsync(process.argv);
