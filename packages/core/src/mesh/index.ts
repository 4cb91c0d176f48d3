/**
 * Mesh module - geometry buffer, derived data, validation and serialization
 */

export * from './types.js';
export * from './bounds.js';
export * from './GeometryBuffer.js';
export * from './validate.js';
export * from './weld.js';
export * from './serialize.js';
