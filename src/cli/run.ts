/**
 * erasure-primer CLI -- print both ways of returning "some vehicle"
 *
 * Usage:
 *   erasure-primer [compare]
 *   erasure-primer any [--count N]
 *   erasure-primer some [--count N]
 *   erasure-primer showroom
 *   erasure-primer inspect <file>
 *   erasure-primer explain <code>
 */

import {
  config,
  explain,
  isPrimerError,
  renderDiagnostic,
  type RandomSource,
} from "@erasure-primer/core";
import { distinctConcreteTypes, typeNameOf } from "@erasure-primer/erased";
import { inspectFile } from "@erasure-primer/inspect";
import {
  describeVehicle,
  printAnyVehicle,
  printSomeVehicle,
  showroom,
  snapshot,
} from "@erasure-primer/vehicles";

const COMMANDS = ["compare", "any", "some", "showroom", "inspect", "explain", "help"] as const;

type Command = (typeof COMMANDS)[number];

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Source of randomness for `any`; defaults to `Math.random`. */
  random?: RandomSource;
}

export interface CliOptions {
  command: Command;
  count: number;
  verbose: boolean;
  color: boolean;
  target?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { command: "compare", count: 1, verbose: false, color: true };
  let sawCommand = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--no-color") {
      options.color = false;
    } else if (arg === "--help" || arg === "-h") {
      options.command = "help";
      sawCommand = true;
    } else if (arg === "--count" || arg === "-n") {
      const value = args[++i];
      const count = value === undefined ? Number.NaN : Number(value);
      if (!Number.isInteger(count) || count < 1) {
        throw new UsageError(`--count expects a positive integer, got ${value ?? "nothing"}`);
      }
      options.count = count;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (!sawCommand) {
      if (!isCommand(arg)) throw new UsageError(`Unknown command: ${arg}`);
      options.command = arg;
      sawCommand = true;
    } else if (options.target === undefined) {
      options.target = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if ((options.command === "inspect" || options.command === "explain") && !options.target) {
    const what = options.command === "inspect" ? "<file>" : "<code>";
    throw new UsageError(`${options.command} requires an argument: erasure-primer ${options.command} ${what}`);
  }

  return options;
}

export const HELP = `
erasure-primer - existential and opaque return types, side by side

USAGE:
  erasure-primer <command> [options]

COMMANDS:
  compare          Call both wrappers once (default)
  any              Call the existential wrapper (anyVehicle)
  some             Call the opaque wrapper (someVehicle)
  showroom         Print a heterogeneous list of vehicles
  inspect <file>   Classify the return types of a module's functions
  explain <code>   Explain a diagnostic code, e.g. EP1004

OPTIONS:
  -n, --count <N>  Number of calls for any/some (default: 1)
  -v, --verbose    Enable debug logging
  --no-color       Disable ANSI colors in diagnostics
  -h, --help       Show this help message

EXAMPLES:
  erasure-primer
  erasure-primer any --count 5
  erasure-primer inspect src/wrappers.ts
  erasure-primer explain EP1004
`;

function execute(options: CliOptions, io: CliIO): number {
  const out = (line: string) => io.out(line);

  switch (options.command) {
    case "help":
      out(HELP);
      return 0;

    case "compare":
      printAnyVehicle(out, io.random);
      out("");
      printSomeVehicle(out);
      return 0;

    case "any":
      for (let i = 0; i < options.count; i++) printAnyVehicle(out, io.random);
      return 0;

    case "some":
      for (let i = 0; i < options.count; i++) printSomeVehicle(out);
      return 0;

    case "showroom": {
      const list = showroom();
      out(`showroom: ${list.length} vehicles, ${distinctConcreteTypes(list).length} concrete types`);
      for (const box of list) {
        out(`- ${typeNameOf(box)}`);
        for (const line of describeVehicle(snapshot(box))) out(`    ${line}`);
      }
      return 0;
    }

    case "inspect": {
      const file = options.target ?? "";
      const reports = inspectFile(file);
      if (reports.length === 0) {
        out(`no functions declared in ${file}`);
        return 0;
      }
      for (const report of reports) {
        out(`${report.name}: ${report.style} (${report.typeText})`);
      }
      return 0;
    }

    case "explain": {
      const code = options.target ?? "";
      const text = explain(code);
      if (text === undefined) {
        io.err(`Unknown diagnostic code: ${code}`);
        return 1;
      }
      out(text);
      return 0;
    }
  }
}

/**
 * Run the CLI with `args` (without the node and script paths).
 *
 * @returns the process exit code
 */
export function run(args: readonly string[], io: CliIO): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(error.message);
    io.err(HELP);
    return 1;
  }

  if (options.verbose) config.set({ debug: true });
  if (!options.color) config.set({ output: { colors: false } });

  try {
    return execute(options, io);
  } catch (error) {
    if (isPrimerError(error)) {
      io.err(renderDiagnostic(error, { colors: colorsFromConfig() }));
    } else {
      io.err(`error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}

// A malformed `output.colors` must not hide the diagnostic being reported
function colorsFromConfig(): boolean {
  try {
    return config.useColors();
  } catch (error) {
    if (isPrimerError(error)) return false;
    throw error;
  }
}
