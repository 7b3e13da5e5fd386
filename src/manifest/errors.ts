/**
 * Manifest validation error types
 *
 * Structured issues with paths and suggestions, collected across a whole
 * manifest before anything is applied.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Validation error codes for resource entries
 */
export type ManifestIssueCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD_TYPE'
  | 'INVALID_VALUE'
  | 'UNKNOWN_KIND'
  | 'UNKNOWN_FIELD'
  | 'UNSUPPORTED_OPTION'
  | 'DUPLICATE_RESOURCE';

/**
 * Codes for manifests that cannot be read at all
 */
export type ManifestLoadErrorCode =
  | 'MANIFEST_NOT_FOUND'
  | 'MANIFEST_PARSE_ERROR'
  | 'INVALID_API_VERSION'
  | 'INVALID_STRUCTURE';

// =============================================================================
// Validation Issue Types
// =============================================================================

export type ValidationSeverity = 'error' | 'warning';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Error code for programmatic handling */
  code: ManifestIssueCode;
  severity: ValidationSeverity;
  message: string;
  /** Path to the problematic field (e.g., "resources[2].zone") */
  path: string;
  context?: Record<string, unknown>;
  suggestions?: string[];
}

/**
 * Result of manifest validation
 */
export interface ValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error thrown when one or more resource entries are invalid
 */
export class ManifestValidationError extends Error {
  constructor(
    message: string,
    public readonly result: ValidationResult
  ) {
    super(message);
    this.name = 'ManifestValidationError';
  }

  /**
   * Format the validation errors for display
   */
  formatErrors(): string {
    return formatIssues(this.result.errors);
  }

  /**
   * Format all issues (including warnings) for display
   */
  formatAll(): string {
    return formatIssues(this.result.issues);
  }
}

/**
 * Error thrown when a manifest file cannot be read or parsed
 */
export class ManifestLoadError extends Error {
  constructor(
    message: string,
    public readonly code: ManifestLoadErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ManifestLoadError';
  }
}

export function formatIssues(issues: readonly ValidationIssue[]): string {
  const lines: string[] = [];
  for (const issue of issues) {
    const prefix = issue.severity === 'error' ? '❌' : '⚠️';
    lines.push(`${prefix} [${issue.code}] ${issue.path}`);
    lines.push(`   ${issue.message}`);
    if (issue.suggestions?.length) {
      lines.push(`   Suggestions:`);
      for (const suggestion of issue.suggestions) {
        lines.push(`     • ${suggestion}`);
      }
    }
  }
  return lines.join('\n');
}

// =============================================================================
// Issue Builders
// =============================================================================

export function missingRequiredField(path: string, field: string, why?: string): ValidationIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message: why ? `Missing required field "${field}" (${why})` : `Missing required field "${field}"`,
    path: `${path}.${field}`,
    context: { field },
  };
}

export function invalidFieldType(path: string, field: string, expected: string, actual: unknown): ValidationIssue {
  return {
    code: 'INVALID_FIELD_TYPE',
    severity: 'error',
    message: `Field "${field}" must be ${expected}, got ${describeValue(actual)}`,
    path: `${path}.${field}`,
    context: { field, expected },
  };
}

export function invalidValue(
  path: string,
  field: string,
  message: string,
  allowed?: readonly string[]
): ValidationIssue {
  return {
    code: 'INVALID_VALUE',
    severity: 'error',
    message,
    path: `${path}.${field}`,
    context: { field },
    suggestions: allowed ? [`Use one of: ${allowed.join(', ')}`] : undefined,
  };
}

export function unknownKind(path: string, kind: unknown, known: readonly string[]): ValidationIssue {
  return {
    code: 'UNKNOWN_KIND',
    severity: 'error',
    message: `Unknown resource kind ${describeValue(kind)}`,
    path: `${path}.kind`,
    context: { kind },
    suggestions: [`Use one of: ${known.join(', ')}`],
  };
}

export function unknownField(path: string, field: string, allowed: readonly string[]): ValidationIssue {
  return {
    code: 'UNKNOWN_FIELD',
    severity: 'error',
    message: `Unknown field "${field}"`,
    path: `${path}.${field}`,
    context: { field },
    suggestions: [`Allowed fields: ${allowed.join(', ')}`],
  };
}

export function unsupportedOption(path: string, option: string, owner: string): ValidationIssue {
  return {
    code: 'UNSUPPORTED_OPTION',
    severity: 'error',
    message: `Option "${option}" is not supported for ${owner}`,
    path: `${path}.${option}`,
    context: { option, owner },
    suggestions: [`Remove "${option}" or change the type`],
  };
}

export function duplicateResource(path: string, key: string, firstPath: string): ValidationIssue {
  return {
    code: 'DUPLICATE_RESOURCE',
    severity: 'error',
    message: `Resource ${key} is already declared at ${firstPath}`,
    path,
    context: { key, firstPath },
    suggestions: ['Declare each resource once'],
  };
}

// =============================================================================
// Result helpers
// =============================================================================

export function buildResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((issue) => issue.severity === 'error');
  const warnings = issues.filter((issue) => issue.severity === 'warning');
  return { valid: errors.length === 0, issues, errors, warnings };
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  if (typeof value === 'string') return `"${value}"`;
  return typeof value;
}
