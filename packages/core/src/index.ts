/**
 * @meshkit/core - engine-independent triangle mesh data
 *
 * This package provides:
 * - GeometryBuffer: vertex/index/attribute arrays with bounds and normal
 *   recomputation, safe to build on any thread
 * - num: tuple vectors, approximate equality, tolerance hashing,
 *   circular indexing
 * - geom: cylindrical UV mapping and planar projection
 *
 * Converting a buffer into a renderable host mesh lives in the host
 * packages (see @meshkit/three).
 */

// num: vectors, tolerances, hashing
export * from './num/vec2.js';
export * from './num/vec3.js';
export * from './num/tolerance.js';
export * from './num/CloseVec3Map.js';
export * from './num/circular.js';

// geom: UV mapping and projection
export * from './geom/surfaceUv.js';

// mesh: geometry buffer
export * from './mesh/index.js';

// errors
export { GeometryError, InvalidArgumentError, InvalidGeometryError } from './errors.js';
