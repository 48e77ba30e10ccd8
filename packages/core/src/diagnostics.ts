/**
 * Diagnostics System for altgen
 *
 * Every run-time contract violation the library reports carries a
 * catalogued code (AG1001-AG2999), a message template and a long-form
 * explanation. Errors are thrown as {@link AltgenError}; the CLI-style
 * renderer prints them in the usual `error[AG1001]: message` shape.
 *
 * @example
 * ```typescript
 * throw new AltgenError(AG1001, { declaration: "Shape", value: "true" });
 *
 * try { ... } catch (e) {
 *   if (e instanceof AltgenError) printDiagnostic(e.diagnostic);
 * }
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Construction = "construction",
  Access = "access",
  Lifecycle = "lifecycle",
  Generator = "generator",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 1001-2999 */
  readonly code: number;

  /** Default severity */
  readonly severity: "error" | "warning" | "info";

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation */
  readonly explanation: string;
}

/** A descriptor with its placeholders filled in. */
export interface Diagnostic {
  code: number;
  severity: "error" | "warning" | "info";
  category: DiagnosticCategory;
  message: string;
  explanation: string;
  notes: string[];
}

// ============================================================================
// Error Catalog
// ============================================================================

export const AG1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Construction,
  messageTemplate: "No alternative of `{declaration}` accepts the value {value}",
  explanation: `A value given to from() is matched against each alternative's guard in
declaration order and stored under the first one that accepts it. This value
was rejected by every guard.

The static signature of from() only admits the declared alternative types,
so this is reached from untyped callers or through values whose run-time
shape does not match their static type.

Build the value through make(key, value) to name the alternative directly.`,
};

export const AG1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Access,
  messageTemplate:
    "`{declaration}` holds alternative `{active}` (tag {tag}), accessed as `{requested}`",
  explanation: `Accessing a variant through an alternative other than the live one is a
contract violation. In the default "unchecked" access mode no check runs and
the result is undefined. This error is only raised when the configuration
sets variant.access to "checked".

Gate access on typeIndex(), is(key) or use match().`,
};

export const AG1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Access,
  messageTemplate: "Dereferenced an empty RecursiveBox",
  explanation: `A RecursiveBox is left empty after move() or release(). Its contents now
belong to the box returned by move(), or have been dropped.`,
};

export const AG1004: DiagnosticDescriptor = {
  code: 1004,
  severity: "error",
  category: DiagnosticCategory.Lifecycle,
  messageTemplate:
    "Cannot assign alternative `{requested}` to `{declaration}` holding `{active}`: the tag is fixed at construction",
  explanation: `A variant's tag is fixed exactly once, when it is constructed. assign()
replaces the payload of the live alternative (disposing the previous payload
first) and never changes the tag.

Construct a new variant to hold a different alternative.`,
};

export const AG1005: DiagnosticDescriptor = {
  code: 1005,
  severity: "error",
  category: DiagnosticCategory.Lifecycle,
  messageTemplate: "Cannot swap `{left}` with `{right}`: declarations and tags must match",
  explanation: `swap() exchanges the payloads of two variants in place. Both must belong to
the same declaration and hold the same alternative, since neither tag may
change.`,
};

export const AG2001: DiagnosticDescriptor = {
  code: 2001,
  severity: "info",
  category: DiagnosticCategory.Generator,
  messageTemplate: "Bounded generator exhausted after {count} value(s)",
  explanation: `bound(g, n) yields n values of g and then the sentinel alternative on every
later call. This is reported once, on the first sentinel.`,
};

const CATALOG: readonly DiagnosticDescriptor[] = [AG1001, AG1002, AG1003, AG1004, AG1005, AG2001];

/** Look up a descriptor by numeric code. */
export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return CATALOG.find((d) => d.code === code);
}

/** All descriptors of one category. */
export function getDiagnosticsByCategory(category: DiagnosticCategory): DiagnosticDescriptor[] {
  return CATALOG.filter((d) => d.category === category);
}

/** `AG1001`-style rendering of a numeric code. */
export function formatCode(code: number): string {
  return `AG${code}`;
}

// ============================================================================
// Building Diagnostics
// ============================================================================

/**
 * Fill `{placeholders}` in a message template. Unknown placeholders are
 * left as written.
 */
export function interpolate(template: string, args: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in args ? String(args[name]) : match,
  );
}

export function createDiagnostic(
  descriptor: DiagnosticDescriptor,
  args: Record<string, string | number> = {},
  notes: string[] = [],
): Diagnostic {
  return {
    code: descriptor.code,
    severity: descriptor.severity,
    category: descriptor.category,
    message: interpolate(descriptor.messageTemplate, args),
    explanation: descriptor.explanation,
    notes,
  };
}

/**
 * Error thrown for catalogued contract violations.
 */
export class AltgenError extends Error {
  readonly code: number;
  readonly diagnostic: Diagnostic;

  constructor(
    descriptor: DiagnosticDescriptor,
    args: Record<string, string | number> = {},
    notes: string[] = [],
  ) {
    const diagnostic = createDiagnostic(descriptor, args, notes);
    super(`${formatCode(diagnostic.code)}: ${diagnostic.message}`);
    this.name = "AltgenError";
    this.code = diagnostic.code;
    this.diagnostic = diagnostic;
  }
}

// ============================================================================
// CLI Renderer
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or ALTGEN_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.ALTGEN_NO_COLOR && env.FORCE_COLOR !== "0";
}

function color(text: string, ...styles: (keyof typeof COLORS)[]): string {
  if (!colorsEnabled()) return text;
  const prefix = styles.map((s) => COLORS[s]).join("");
  return `${prefix}${text}${COLORS.reset}`;
}

function severityColor(severity: "error" | "warning" | "info"): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

/** Options for CLI rendering. */
export interface RenderOptions {
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Render a diagnostic to CLI output.
 *
 * @example Output:
 * ```
 * error[AG1004]: Cannot assign alternative `string` to `Shape` holding `number`: ...
 *    = note: tag 0
 * ```
 */
export function renderDiagnostic(diagnostic: Diagnostic, options: RenderOptions = {}): string {
  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[${formatCode(diagnostic.code)}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`,
  );

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (options.showExplanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/** Print a diagnostic (stderr by default). */
export function printDiagnostic(diagnostic: Diagnostic, options: RenderOptions = {}): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnostic(diagnostic, options));
}
