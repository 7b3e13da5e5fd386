/**
 * Manifest YAML loading utilities
 *
 * A manifest lists the resources to reconcile:
 *
 * ```yaml
 * apiVersion: technitium-reconcile/v1
 * resources:
 *   - kind: zone
 *     zone: example.com
 *   - kind: blocked-domain
 *     domain: ads.example.net
 * ```
 *
 * JSON manifests parse the same way.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, isAbsolute } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isRecord } from '../api/envelope.js';
import type { ResourceDescriptor } from '../reconcilers/types.js';
import { ManifestLoadError } from './errors.js';
import { parseResources } from './validator.js';

/** Current supported API version for manifest files */
export const MANIFEST_API_VERSION = 'technitium-reconcile/v1';

export interface Manifest {
  /** Absolute path of the file, when loaded from disk */
  path?: string;
  apiVersion: string;
  resources: ResourceDescriptor[];
}

/**
 * Parse manifest text
 *
 * @throws ManifestLoadError if the text is not a manifest
 * @throws ManifestValidationError if any resource entry is invalid
 */
export function parseManifest(content: string, sourcePath?: string): Manifest {
  let doc: unknown;
  try {
    doc = parseYaml(content);
  } catch (err) {
    throw new ManifestLoadError(
      `Failed to parse manifest: ${err instanceof Error ? err.message : String(err)}`,
      'MANIFEST_PARSE_ERROR',
      { path: sourcePath }
    );
  }

  if (!isRecord(doc)) {
    throw new ManifestLoadError('Manifest must be a mapping with apiVersion and resources', 'INVALID_STRUCTURE', {
      path: sourcePath,
    });
  }

  if (doc.apiVersion !== MANIFEST_API_VERSION) {
    throw new ManifestLoadError(
      doc.apiVersion === undefined
        ? `Missing required field: apiVersion (expected ${MANIFEST_API_VERSION})`
        : `Unsupported API version: ${String(doc.apiVersion)}. Expected: ${MANIFEST_API_VERSION}`,
      'INVALID_API_VERSION',
      { found: doc.apiVersion, expected: MANIFEST_API_VERSION, path: sourcePath }
    );
  }

  const entries = doc.resources ?? [];
  if (!Array.isArray(entries)) {
    throw new ManifestLoadError('Field "resources" must be a list', 'INVALID_STRUCTURE', {
      path: sourcePath,
    });
  }

  return {
    path: sourcePath,
    apiVersion: MANIFEST_API_VERSION,
    resources: parseResources(entries),
  };
}

/**
 * Load and validate a manifest file
 *
 * @param manifestPath - Path to the YAML or JSON file
 * @param basePath - Directory relative paths resolve against (default: cwd)
 */
export async function loadManifest(manifestPath: string, basePath?: string): Promise<Manifest> {
  const absolutePath = isAbsolute(manifestPath)
    ? manifestPath
    : resolve(basePath ?? process.cwd(), manifestPath);

  if (!existsSync(absolutePath)) {
    throw new ManifestLoadError(`Manifest file not found: ${absolutePath}`, 'MANIFEST_NOT_FOUND', {
      path: absolutePath,
    });
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ManifestLoadError(
      `Failed to read manifest file: ${err instanceof Error ? err.message : String(err)}`,
      'MANIFEST_NOT_FOUND',
      { path: absolutePath }
    );
  }

  return parseManifest(content, absolutePath);
}
