/**
 * Manifest loading and resource validation
 */

export { loadManifest, parseManifest, MANIFEST_API_VERSION, type Manifest } from './loader.js';
export {
  validateResource,
  validateResources,
  parseResource,
  parseResources,
  type ResourceValidation,
} from './validator.js';
export {
  ManifestValidationError,
  ManifestLoadError,
  formatIssues,
  buildResult,
  type ValidationIssue,
  type ValidationResult,
  type ValidationSeverity,
  type ManifestIssueCode,
  type ManifestLoadErrorCode,
} from './errors.js';
