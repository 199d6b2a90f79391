/**
 * Compile-time classification of function return types.
 *
 * A module is type-checked in memory and every top-level function's
 * return type is sorted into one of three styles:
 *
 * - `opaque`: an instantiation of an opaque alias (`Opaque<Vehicle, "SomeVehicle">`)
 * - `existential`: an interface, or an existential wrapper type
 * - `concrete`: anything else (classes, primitives, literals)
 *
 * Arrays take the style of their elements, so `ExistentialList<Vehicle>`
 * and `Vehicle[]` are existential while `Tesla[]` is concrete.
 *
 * @module
 */

import * as fs from "fs";
import ts from "typescript";
import { createLogger, EP1007, primerError } from "@erasure-primer/core";

const log = createLogger("inspect");

const VIRTUAL_FILE = "/inspect/input.ts";
const LIB_FILE = "/inspect/lib.d.ts";

// The global types the checker needs, and arrays, without the real lib files
const LIB_SOURCE = `
interface Array<T> { length: number; [n: number]: T; }
interface ReadonlyArray<T> { readonly length: number; readonly [n: number]: T; }
interface Boolean {}
interface Function {}
interface CallableFunction extends Function {}
interface NewableFunction extends Function {}
interface IArguments {}
interface Number {}
interface Object {}
interface RegExp {}
interface String {}
`;

export type ReturnStyle = "existential" | "opaque" | "concrete";

export interface FunctionReport {
  readonly name: string;
  readonly style: ReturnStyle;
  /** The return type as the compiler prints it. */
  readonly typeText: string;
}

export interface InspectOptions {
  /** Alias names whose instantiations count as opaque. Default `["Opaque"]`. */
  readonly opaqueAliases?: readonly string[];
  /** Type names that count as existential besides interfaces. Default `["Existential"]`. */
  readonly existentialNames?: readonly string[];
  /** Shown in diagnostics in place of the in-memory file name. */
  readonly fileName?: string;
}

function createInspectProgram(source: string): { program: ts.Program; sourceFile: ts.SourceFile } {
  const sourceFile = ts.createSourceFile(VIRTUAL_FILE, source, ts.ScriptTarget.ES2022, true);

  const libFile = ts.createSourceFile(LIB_FILE, LIB_SOURCE, ts.ScriptTarget.ES2022, true);
  const files = new Map([
    [VIRTUAL_FILE, { sourceFile, text: source }],
    [LIB_FILE, { sourceFile: libFile, text: LIB_SOURCE }],
  ]);

  const compilerHost: ts.CompilerHost = {
    getSourceFile: (fileName) => files.get(fileName)?.sourceFile,
    getDefaultLibFileName: () => LIB_FILE,
    writeFile: () => undefined,
    getCurrentDirectory: () => "/",
    getCanonicalFileName: (fileName) => fileName,
    useCaseSensitiveFileNames: () => true,
    getNewLine: () => "\n",
    fileExists: (fileName) => files.has(fileName),
    readFile: (fileName) => files.get(fileName)?.text,
    directoryExists: () => true,
    getDirectories: () => [],
  };

  const program = ts.createProgram({
    rootNames: [VIRTUAL_FILE],
    options: {
      target: ts.ScriptTarget.ES2022,
      strict: true,
      noEmit: true,
      types: [],
    },
    host: compilerHost,
  });

  return { program, sourceFile };
}

interface Classifier {
  readonly checker: ts.TypeChecker;
  readonly opaqueAliases: readonly string[];
  readonly existentialNames: readonly string[];
}

function classifyType(type: ts.Type, classifier: Classifier): ReturnStyle {
  const { checker, opaqueAliases, existentialNames } = classifier;
  const alias = type.aliasSymbol;
  if (alias !== undefined && opaqueAliases.includes(alias.getName())) return "opaque";
  if (alias !== undefined && existentialNames.includes(alias.getName())) return "existential";

  const symbol = type.getSymbol();
  if (symbol === undefined) return "concrete";
  if (existentialNames.includes(symbol.getName())) return "existential";
  if (symbol.getName() === "Array" || symbol.getName() === "ReadonlyArray") {
    const element = checker.getIndexTypeOfType(type, ts.IndexKind.Number);
    return element === undefined ? "concrete" : classifyType(element, classifier);
  }
  if ((symbol.getFlags() & ts.SymbolFlags.Class) !== 0) return "concrete";
  if ((symbol.getFlags() & ts.SymbolFlags.Interface) !== 0) return "existential";
  return "concrete";
}

/**
 * Classify every top-level function declared in `source`.
 *
 * Overloaded functions are reported once, by their first signature.
 */
export function inspectSource(source: string, options: InspectOptions = {}): FunctionReport[] {
  const opaqueAliases = options.opaqueAliases ?? ["Opaque"];
  const existentialNames = options.existentialNames ?? ["Existential"];
  const { program, sourceFile } = createInspectProgram(source);
  const checker = program.getTypeChecker();

  const reports: FunctionReport[] = [];
  const seen = new Set<string>();

  for (const statement of sourceFile.statements) {
    if (!ts.isFunctionDeclaration(statement) || statement.name === undefined) continue;
    const name = statement.name.text;
    if (seen.has(name)) continue;
    seen.add(name);

    const signature = checker.getSignatureFromDeclaration(statement);
    if (signature === undefined) continue;
    const returnType = checker.getReturnTypeOfSignature(signature);

    reports.push({
      name,
      style: classifyType(returnType, { checker, opaqueAliases, existentialNames }),
      typeText: checker.typeToString(returnType),
    });
  }

  log.debug(`classified ${reports.length} function(s) in ${options.fileName ?? "<source>"}`);
  return reports;
}

/**
 * Classify one function.
 *
 * @throws {PrimerError} EP1007 when `source` declares no function `name`.
 */
export function classifyFunction(
  source: string,
  name: string,
  options: InspectOptions = {},
): FunctionReport {
  const reports = inspectSource(source, options);
  const report = reports.find((r) => r.name === name);
  if (report !== undefined) return report;

  const builder = primerError(EP1007, { function: name, file: options.fileName ?? "<source>" });
  if (reports.length > 0) {
    builder.note(`declared functions: ${reports.map((r) => r.name).join(", ")}`);
  }
  throw builder.build();
}

/** Read `path` from disk and classify its functions. */
export function inspectFile(path: string, options: InspectOptions = {}): FunctionReport[] {
  const source = fs.readFileSync(path, "utf8");
  return inspectSource(source, { ...options, fileName: options.fileName ?? path });
}
