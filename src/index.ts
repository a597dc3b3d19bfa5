export { Vector, vec2, vec3, vec4, DEFAULT_EPSILON } from './math/Vector';
export type { Dimension, Vector2D, Vector3D, Vector4D } from './math/Vector';
export { project, reject, scalarProjection, projectOntoUnit, decompose } from './math/projection';
export type { Decomposition } from './math/projection';
export { createRandomSource } from './services/random';
export type { RandomSource } from './services/random';
export {
  VectorError,
  ComponentIndexError,
  DimensionMismatchError,
  DegenerateVectorError,
  RandomRangeError,
} from './utils/errors';
