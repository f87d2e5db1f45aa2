/**
 * Diagnostic types for the retargeting engine
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Type resolution (QSH1001-QSH1099)
  | "QSH1001" // Type not found in destination universe
  | "QSH1002" // Type found in several modules of destination universe
  // Member resolution (QSH1101-QSH1199)
  | "QSH1101" // Property not found
  | "QSH1102" // Field not found
  | "QSH1103" // Method not found
  | "QSH1104" // Constructor not found
  // Expression construction (QSH2001-QSH2199)
  | "QSH2001" // First-class lambda cannot cross universes
  | "QSH2101" // Checked construction rejected a node
  | "QSH5001" // Reference evaluator failure
  | "QSH6001" // Internal error
  // Universe manifest loading (QSH9001-QSH9012)
  | "QSH9001" // Manifest file not found
  | "QSH9002" // Failed to read manifest file
  | "QSH9003" // Invalid JSON in manifest file
  | "QSH9004" // Manifest must be an object
  | "QSH9005" // Missing or invalid 'modules' field
  | "QSH9006" // Invalid module entry
  | "QSH9007" // Invalid type entry
  | "QSH9008" // Invalid member entry
  | "QSH9009" // Unknown type reference
  | "QSH9010" // Duplicate type in module
  | "QSH9011" // Invalid union or record shape
  | "QSH9012"; // Generic arity mismatch

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  hint,
});

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
