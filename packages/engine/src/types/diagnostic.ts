/**
 * Diagnostic types for call resolution
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Member lookup (CLR1001-CLR1099)
  | "CLR1001" // No member matches the requested name/signature
  | "CLR1002" // Type has no matching public constructors
  | "CLR1003" // Several overloads match; resolved interactively
  | "CLR1004" // Overload choice aborted
  // Argument binding (CLR2001-CLR2099)
  | "CLR2001" // Value cannot be converted to the parameter type
  | "CLR2002" // Chosen overloads kept failing to bind
  // Generic binding (CLR3001-CLR3099)
  | "CLR3001" // No generic-slot layout matches the argument types
  | "CLR3002" // Wrong number of generic arguments
  // Invocation (CLR4001-CLR4099)
  | "CLR4001" // Underlying call threw
  | "CLR4002" // Argument count/type mismatch at invocation
  | "CLR4003" // Method has no implementation
  // Type names (CLR5001-CLR5099)
  | "CLR5001" // Invalid type name syntax
  | "CLR5002" // Type not found in catalog
  // Catalog loading (CLR9001-CLR9099)
  | "CLR9001" // Catalog file not found
  | "CLR9002" // Failed to read catalog file
  | "CLR9003" // Invalid YAML/JSON in catalog file
  | "CLR9004" // Catalog document must be an object
  | "CLR9005" // Missing or invalid 'module' field
  | "CLR9006" // Missing or invalid 'types' field
  | "CLR9007" // Invalid type entry: must be an object
  | "CLR9008" // Invalid type entry: missing or invalid field
  | "CLR9009" // Invalid type entry: 'kind' must be one of ...
  | "CLR9010" // Invalid member entry
  | "CLR9011" // Invalid type reference in entry
  | "CLR9012"; // Duplicate type name

/**
 * Context attached to resolution diagnostics so a failure can be understood
 * without re-running with tracing enabled.
 */
export type DiagnosticDetails = {
  readonly typeName?: string;
  readonly memberName?: string;
  readonly candidates?: readonly string[];
  readonly source?: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly hint?: string;
  readonly details?: DiagnosticDetails;
  readonly cause?: unknown;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  details?: DiagnosticDetails,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  ...(details ? { details } : {}),
  ...(hint ? { hint } : {}),
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.details?.source) {
    parts.push(`${diagnostic.details.source}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  const head = parts.join(" ");
  const candidates = diagnostic.details?.candidates ?? [];
  if (candidates.length === 0) return head;

  return [head, "  Candidates:", ...candidates.map((c) => `    ${c}`)].join(
    "\n"
  );
};
