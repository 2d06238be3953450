/**
 * `rbac-sync validate`
 *
 * Runs manifests through the same decoding, defaulting and validation the
 * admission webhook applies on CREATE, without a cluster.
 * @module @rbac-sync/controller/commands/validate
 */

import fs from 'node:fs';
import { Command } from 'commander';
import { loadAllYaml } from '@kubernetes/client-node';
import {
  DEFAULT_FALLBACK_NAMESPACE,
  RBACRULE_KIND,
  applyRbacRuleDefaults,
  isObjectTypeError,
  isRecord,
  isValidationError,
  parseRbacRule,
  toError,
  validateRbacRule,
  type RBACRuleSpec,
  type ValidationErrorDetail,
} from '@rbac-sync/shared';
import { error, info, success, warn } from '../output.js';

export interface ManifestReport {
  /** Position of the document in its file */
  index: number;
  name: string;
  valid: boolean;
  errors: ValidationErrorDetail[];
  warnings: string[];
  /** Spec after defaulting, when the document decoded */
  spec?: RBACRuleSpec;
}

export interface CheckOptions {
  defaultNamespace?: string;
  now?: Date;
}

function documentName(document: Record<string, unknown>, index: number): string {
  const metadata = document.metadata;
  if (isRecord(metadata) && typeof metadata.name === 'string') {
    return metadata.name;
  }
  return `document ${index}`;
}

/**
 * Check every RBACRule among the documents; other kinds are skipped
 */
export function checkManifests(documents: unknown[], options: CheckOptions = {}): ManifestReport[] {
  const reports: ManifestReport[] = [];

  documents.forEach((document, index) => {
    if (!isRecord(document) || document.kind !== RBACRULE_KIND) {
      return;
    }
    const name = documentName(document, index);

    try {
      const rule = parseRbacRule(document);
      const spec = applyRbacRuleDefaults(rule.spec, options.defaultNamespace ?? DEFAULT_FALLBACK_NAMESPACE);
      const result = validateRbacRule({ ...rule, spec }, { operation: 'CREATE', now: options.now });
      reports.push({ index, name, valid: result.valid, errors: result.errors, warnings: result.warnings, spec });
    } catch (caught) {
      if (isValidationError(caught)) {
        reports.push({ index, name, valid: false, errors: caught.details, warnings: [] });
      } else if (isObjectTypeError(caught)) {
        reports.push({
          index,
          name,
          valid: false,
          errors: [{ field: 'apiVersion', message: caught.message, code: 'INVALID_OBJECT_TYPE' }],
          warnings: [],
        });
      } else {
        throw caught;
      }
    }
  });

  return reports;
}

/**
 * Read and check one manifest file; returns whether every rule in it is valid
 */
export function validateFile(file: string, options: CheckOptions = {}): boolean {
  let documents: unknown[];
  try {
    documents = loadAllYaml(fs.readFileSync(file, 'utf8'));
  } catch (caught) {
    error(`${file}: ${toError(caught).message}`);
    return false;
  }

  const reports = checkManifests(documents, options);
  if (reports.length === 0) {
    warn(`${file}: no RBACRule documents found`);
    return true;
  }

  let allValid = true;
  for (const report of reports) {
    for (const warning of report.warnings) {
      warn(`${file}: RBACRule "${report.name}": ${warning}`);
    }
    if (report.valid) {
      success(`${file}: RBACRule "${report.name}" is valid`);
    } else {
      allValid = false;
      error(
        `${file}: RBACRule "${report.name}" is invalid`,
        report.errors.map((detail) => `${detail.field}: ${detail.message}`),
      );
    }
  }
  return allValid;
}

/**
 * Creates the `validate` command
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check RBACRule manifests without a cluster')
    .argument('<files...>', 'YAML files with one or more documents')
    .option('--default-namespace <name>', 'Namespace filled into bindings that select none', DEFAULT_FALLBACK_NAMESPACE)
    .action((files: string[], options: { defaultNamespace: string }) => {
      const results = files.map((file) => validateFile(file, { defaultNamespace: options.defaultNamespace }));
      const invalid = results.filter((ok) => !ok).length;
      if (invalid > 0) {
        error(`${invalid} of ${files.length} file(s) failed validation`);
        process.exitCode = 1;
      } else {
        info(`${files.length} file(s) checked`);
      }
    });
}
