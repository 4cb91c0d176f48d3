/**
 * Geometry error types
 *
 * All failures raised by meshkit are synchronous and leave the buffer
 * they were called on untouched.
 */

import type { ValidationReport } from './mesh/validate.js';

/**
 * Base class for geometry errors
 */
export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A caller passed an argument the operation cannot work with
 * (absent source mesh, zero plane normal, empty point list, ...)
 */
export class InvalidArgumentError extends GeometryError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.argument = argument;
  }
}

/**
 * A buffer breaks its own invariants (indices out of range,
 * attribute arrays of the wrong length, ...)
 */
export class InvalidGeometryError extends GeometryError {
  readonly report: ValidationReport;

  constructor(message: string, report: ValidationReport) {
    super(message);
    this.report = report;
  }
}
