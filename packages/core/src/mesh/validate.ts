/**
 * Geometry buffer validation
 *
 * Checks the invariants a buffer must hold before it is handed to a host:
 * - triangle list length is a multiple of three
 * - every index references an existing vertex
 * - every present per-vertex channel has exactly one entry per vertex
 * - vertex positions are finite
 * and optionally reports degenerate triangles and stale bounds.
 */

import { sub3, cross3, lengthSq3 } from '../num/vec3.js';
import type { GeometryBuffer } from './GeometryBuffer.js';
import { boundsContains } from './bounds.js';
import { VERTEX_ATTRIBUTES, type VertexAttributeName } from './types.js';

/**
 * Types of validation issues
 */
export type ValidationIssueKind =
  | 'triangleLengthNotMultipleOfThree'
  | 'indexOutOfRange'
  | 'attributeLengthMismatch'
  | 'nonFiniteVertex'
  | 'degenerateTriangle'
  | 'boundsStale';

/**
 * Severity levels for validation issues
 */
export type ValidationSeverity = 'error' | 'warning' | 'info';

/**
 * What a validation issue points at
 */
export type ValidationLocation =
  | { type: 'vertex'; index: number }
  | { type: 'triangle'; index: number }
  | { type: 'attribute'; attribute: VertexAttributeName }
  | { type: 'buffer' };

/**
 * A single validation issue
 */
export interface ValidationIssue {
  kind: ValidationIssueKind;
  severity: ValidationSeverity;
  /** Human-readable description */
  message: string;
  location: ValidationLocation;
}

/**
 * Complete validation report
 */
export interface ValidationReport {
  /** Whether the buffer is valid (no errors) */
  isValid: boolean;
  issues: ValidationIssue[];
  errorCount: number;
  warningCount: number;
  infoCount: number;
}

/**
 * Validation options
 */
export interface ValidationOptions {
  /** Report zero-area triangles as warnings */
  checkDegenerate?: boolean;
  /** Report vertices outside the cached bounds as warnings */
  checkBounds?: boolean;
  /** Stop collecting issues after this many */
  maxIssues?: number;
}

export const DEFAULT_VALIDATION_OPTIONS: Required<ValidationOptions> = {
  checkDegenerate: true,
  checkBounds: false,
  maxIssues: 100,
};

function createReport(): ValidationReport {
  return {
    isValid: true,
    issues: [],
    errorCount: 0,
    warningCount: 0,
    infoCount: 0,
  };
}

function addIssue(
  report: ValidationReport,
  kind: ValidationIssueKind,
  severity: ValidationSeverity,
  message: string,
  location: ValidationLocation
): void {
  report.issues.push({ kind, severity, message, location });

  if (severity === 'error') {
    report.errorCount++;
    report.isValid = false;
  } else if (severity === 'warning') {
    report.warningCount++;
  } else {
    report.infoCount++;
  }
}

/**
 * Validate a geometry buffer
 *
 * @param buffer The buffer to check
 * @param options Validation options
 * @returns Validation report; `isValid` is false when any error was found
 */
export function validateGeometry(buffer: GeometryBuffer, options: ValidationOptions = {}): ValidationReport {
  const opts: Required<ValidationOptions> = {
    checkDegenerate: options.checkDegenerate ?? DEFAULT_VALIDATION_OPTIONS.checkDegenerate,
    checkBounds: options.checkBounds ?? DEFAULT_VALIDATION_OPTIONS.checkBounds,
    maxIssues: options.maxIssues ?? DEFAULT_VALIDATION_OPTIONS.maxIssues,
  };
  const report = createReport();
  const full = (): boolean => report.issues.length >= opts.maxIssues;

  const vertices = buffer.vertices ?? [];
  const n = vertices.length;

  for (let i = 0; i < n && !full(); i++) {
    const v = vertices[i];
    if (!Number.isFinite(v[0]) || !Number.isFinite(v[1]) || !Number.isFinite(v[2])) {
      addIssue(report, 'nonFiniteVertex', 'error', `Vertex ${i} has a non-finite coordinate`, {
        type: 'vertex',
        index: i,
      });
    }
  }

  for (const name of VERTEX_ATTRIBUTES) {
    const channel = buffer[name];
    if (channel && channel.length !== n && !full()) {
      addIssue(
        report,
        'attributeLengthMismatch',
        'error',
        `Attribute ${name} has ${channel.length} entries for ${n} vertices`,
        { type: 'attribute', attribute: name }
      );
    }
  }

  const triangles = buffer.triangles ?? [];
  if (triangles.length % 3 !== 0) {
    addIssue(
      report,
      'triangleLengthNotMultipleOfThree',
      'error',
      `Triangle list has ${triangles.length} indices, not a multiple of 3`,
      { type: 'buffer' }
    );
  }

  for (let t = 0; t + 2 < triangles.length && !full(); t += 3) {
    const tri = t / 3;
    const corners = [triangles[t], triangles[t + 1], triangles[t + 2]];
    const bad = corners.find((i) => !Number.isInteger(i) || i < 0 || i >= n);
    if (bad !== undefined) {
      addIssue(report, 'indexOutOfRange', 'error', `Triangle ${tri} references vertex ${bad} of ${n}`, {
        type: 'triangle',
        index: tri,
      });
      continue;
    }

    if (opts.checkDegenerate) {
      const [i0, i1, i2] = corners;
      const face = cross3(sub3(vertices[i1], vertices[i0]), sub3(vertices[i2], vertices[i0]));
      if (lengthSq3(face) === 0) {
        addIssue(report, 'degenerateTriangle', 'warning', `Triangle ${tri} has zero area`, {
          type: 'triangle',
          index: tri,
        });
      }
    }
  }

  if (opts.checkBounds) {
    for (let i = 0; i < n && !full(); i++) {
      if (!boundsContains(buffer.bounds, vertices[i])) {
        addIssue(report, 'boundsStale', 'warning', `Vertex ${i} lies outside the cached bounds`, {
          type: 'vertex',
          index: i,
        });
      }
    }
  }

  return report;
}

/**
 * Quick check that a buffer holds its invariants
 */
export function isValidGeometry(buffer: GeometryBuffer): boolean {
  return validateGeometry(buffer, { checkDegenerate: false }).isValid;
}
