/**
 * Diagnostics for erasure-primer
 *
 * Every error the library throws is a {@link PrimerError} built from a
 * catalog entry: a stable code, a message template with `{placeholders}`
 * and a long-form explanation for `erasure-primer explain`.
 *
 * @example
 * ```typescript
 * throw primerError(EP1001, { type: "Scooter", capability: "Vehicle", requirement: "price" })
 *   .note("`Vehicle` requires: isElectric, price")
 *   .help("add a `price: number` property to Scooter")
 *   .build();
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Conformance = "conformance",
  Dispatch = "dispatch",
  Opaque = "opaque",
  Registry = "registry",
  Inspection = "inspect",
  Configuration = "config",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export type Severity = "error" | "warning" | "info";

export interface DiagnosticDescriptor {
  /** Unique error code, rendered as `EP<code>` */
  readonly code: number;

  readonly severity: Severity;

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for `explain` */
  readonly explanation: string;
}

// ============================================================================
// Error Type
// ============================================================================

/**
 * An error raised from a catalog descriptor.
 */
export class PrimerError extends Error {
  constructor(
    readonly descriptor: DiagnosticDescriptor,
    message: string,
    readonly args: Readonly<Record<string, string>>,
    readonly notes: readonly string[],
    readonly helpText: string | undefined,
  ) {
    super(message);
    this.name = "PrimerError";
  }

  /** The rendered code, e.g. `EP1001`. */
  get code(): string {
    return formatCode(this.descriptor.code);
  }

  get severity(): Severity {
    return this.descriptor.severity;
  }
}

export function isPrimerError(error: unknown): error is PrimerError {
  return error instanceof PrimerError;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for {@link PrimerError}.
 */
export class DiagnosticBuilder {
  private readonly args: Record<string, string> = {};
  private readonly notes: string[] = [];
  private helpText: string | undefined;

  constructor(private readonly descriptor: DiagnosticDescriptor) {}

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | boolean | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  note(message: string): this {
    this.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.helpText = message;
    return this;
  }

  build(): PrimerError {
    return new PrimerError(
      this.descriptor,
      interpolate(this.descriptor.messageTemplate, this.args),
      { ...this.args },
      [...this.notes],
      this.helpText,
    );
  }
}

/**
 * Start building an error from a catalog entry.
 */
export function primerError(
  descriptor: DiagnosticDescriptor,
  args: Record<string, string | number | boolean | undefined> = {},
): DiagnosticBuilder {
  return new DiagnosticBuilder(descriptor).withArgs(args);
}

function interpolate(template: string, args: Record<string, string>): string {
  let message = template;
  for (const [key, value] of Object.entries(args)) {
    message = message.replace(new RegExp(`\\{${key}\\}`, "g"), value);
  }
  return message;
}

export function formatCode(code: number): string {
  return `EP${code}`;
}

// ============================================================================
// Error Catalog: Conformance (1001-1003)
// ============================================================================

export const EP1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Conformance,
  messageTemplate: "`{type}` does not satisfy `{capability}`: missing `{requirement}`",
  explanation: `A value was offered as an implementer of a capability but lacks one of
its required attributes.

Every attribute a capability declares must be present on the value, either
as an own property, an inherited property or a getter.

Example:
  const Vehicle = defineCapability<Vehicle>()("Vehicle", {
    isElectric: "boolean",
    price: "number",
  });

  erase(Vehicle, { isElectric: true });   // ✗ missing \`price\``,
};

export const EP1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Conformance,
  messageTemplate:
    "`{type}` does not satisfy `{capability}`: `{requirement}` must be {expected}, found {actual}",
  explanation: `A required attribute is present but holds a value of the wrong kind.

Capabilities declare each attribute as "boolean", "number" or "string", and
the value's runtime \`typeof\` must match.

Example:
  erase(Vehicle, { isElectric: "yes", price: 10 });   // ✗ boolean expected`,
};

export const EP1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Dispatch,
  messageTemplate: "`{capability}` has no requirement `{requirement}`",
  explanation: `A read was dispatched for an attribute the capability does not declare.

An existential value only remembers how to read the attributes of its
capability. Anything else about the concrete type was erased when the value
was wrapped. Recover the concrete value with downcast() to reach other
members.`,
};

// ============================================================================
// Error Catalog: Opaque (1004)
// ============================================================================

export const EP1004: DiagnosticDescriptor = {
  code: 1004,
  severity: "error",
  category: DiagnosticCategory.Opaque,
  messageTemplate: "opaque `{tag}` returned `{actual}` after pinning `{pinned}`",
  explanation: `An opaque function must return one concrete type on every call.

The first call pins the concrete type. A later call that produces a value of
a different concrete type breaks the promise callers rely on: that the
hidden type is fixed by the function's definition.

If the function really needs to choose between types at run time, return an
existential instead:
  const anyVehicle = () => erase(Vehicle, coin() ? new Tesla() : new Bicycle());

Verification can be switched off with \`opaque.verify: false\`.`,
};

// ============================================================================
// Error Catalog: Registry (1005-1006)
// ============================================================================

export const EP1005: DiagnosticDescriptor = {
  code: 1005,
  severity: "error",
  category: DiagnosticCategory.Registry,
  messageTemplate: "no implementers registered for `{capability}`",
  explanation: `A random implementer was requested from an empty registry.

Register at least one factory before picking:
  registry.register("Tesla", () => new Tesla());`,
};

export const EP1006: DiagnosticDescriptor = {
  code: 1006,
  severity: "error",
  category: DiagnosticCategory.Registry,
  messageTemplate: "`{type}` is already registered for `{capability}`",
  explanation: `Each implementer name may be registered once per capability.

Pick a different name, or remove the earlier registration.`,
};

// ============================================================================
// Error Catalog: Inspection (1007)
// ============================================================================

export const EP1007: DiagnosticDescriptor = {
  code: 1007,
  severity: "error",
  category: DiagnosticCategory.Inspection,
  messageTemplate: "function `{function}` not found in {file}",
  explanation: `Only top-level function declarations are classified.

Arrow functions assigned to variables and class methods are not listed.`,
};

// ============================================================================
// Error Catalog: Configuration (1008)
// ============================================================================

export const EP1008: DiagnosticDescriptor = {
  code: 1008,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "invalid configuration value for `{key}`: {reason}",
  explanation: `A configuration value failed validation.

Configuration is read from ERASURE_PRIMER_* environment variables, an
erasure-primer config file, or the "erasure-primer" key in package.json.

  output.fractionDigits   integer between 0 and 20
  opaque.verify           boolean
  debug                   boolean`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

const CATALOG: readonly DiagnosticDescriptor[] = [
  EP1001,
  EP1002,
  EP1003,
  EP1004,
  EP1005,
  EP1006,
  EP1007,
  EP1008,
];

/**
 * Look up a descriptor by numeric code or by its rendered form (`EP1004`).
 */
export function getDescriptor(code: number | string): DiagnosticDescriptor | undefined {
  const numeric =
    typeof code === "number" ? code : Number.parseInt(code.trim().replace(/^EP/i, ""), 10);
  return CATALOG.find((d) => d.code === numeric);
}

export function allDescriptors(): readonly DiagnosticDescriptor[] {
  return CATALOG;
}

// ============================================================================
// CLI Renderer
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

export interface RenderOptions {
  /** Use ANSI colors (default: on, unless NO_COLOR or ERASURE_PRIMER_NO_COLOR is set) */
  colors?: boolean;
  /** Append the catalog explanation */
  showExplanation?: boolean;
}

function colorsEnabled(requested: boolean | undefined): boolean {
  if (requested === false) return false;
  const env = process.env;
  return !env.NO_COLOR && !env.ERASURE_PRIMER_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

/**
 * Render a {@link PrimerError} in Rust-style format.
 *
 * @example Output:
 * ```
 * error[EP1001]: `Scooter` does not satisfy `Vehicle`: missing `price`
 *    = note: `Vehicle` requires: isElectric, price
 *    = help: add a `price: number` property to Scooter
 * ```
 */
export function renderDiagnostic(error: PrimerError, options: RenderOptions = {}): string {
  const useColor = colorsEnabled(options.colors);
  const color = (text: string, ...styles: (keyof typeof COLORS)[]): string =>
    useColor ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const clr = severityColor(error.severity);
  const lines = [
    `${color(`${error.severity}[${error.code}]`, "bold", clr)}: ${color(error.message, "bold")}`,
  ];

  for (const note of error.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }
  if (error.helpText) {
    lines.push(`   ${color("= help:", "bold", "green")} ${error.helpText}`);
  }

  if (options.showExplanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const line of error.descriptor.explanation.split("\n")) {
      lines.push(`  ${line}`);
    }
  }

  return lines.join("\n");
}

/**
 * The long-form explanation for a code, headed by its message template.
 */
export function explain(code: number | string): string | undefined {
  const descriptor = getDescriptor(code);
  if (!descriptor) return undefined;
  return [
    `${formatCode(descriptor.code)} (${descriptor.category}, ${descriptor.severity})`,
    `  ${descriptor.messageTemplate}`,
    "",
    descriptor.explanation,
  ].join("\n");
}
