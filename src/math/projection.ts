import { Dimension, Vector } from './Vector';
import { DegenerateVectorError } from '../utils/errors';

export interface Decomposition<N extends Dimension> {
  parallel: Vector<N>;
  perpendicular: Vector<N>;
}

// proj_b(a) = Dot(a, b) / Dot(b, b) * b
export const project = <N extends Dimension>(a: Vector<N>, b: Vector<N>): Vector<N> => {
  const bb = Vector.dot(b, b);
  if (bb === 0) throw new DegenerateVectorError('project onto');
  return b.scale(Vector.dot(a, b) / bb);
};

export const reject = <N extends Dimension>(a: Vector<N>, b: Vector<N>): Vector<N> => {
  return a.subtract(project(a, b));
};

/**
 * Signed length of `a` along `b`, i.e. comp_b(a) = Dot(a, b) / |b|.
 */
export const scalarProjection = <N extends Dimension>(a: Vector<N>, b: Vector<N>): number => {
  const length = b.magnitude();
  if (length === 0) throw new DegenerateVectorError('measure a component along');
  return Vector.dot(a, b) / length;
};

/**
 * Projection onto a basis already known to be unit length. The length is
 * not checked; a non-unit `unitB` scales the result by |unitB|^2.
 */
export const projectOntoUnit = <N extends Dimension>(a: Vector<N>, unitB: Vector<N>): Vector<N> => {
  return unitB.scale(Vector.dot(a, unitB));
};

export const decompose = <N extends Dimension>(a: Vector<N>, b: Vector<N>): Decomposition<N> => {
  const parallel = project(a, b);
  return { parallel, perpendicular: a.subtract(parallel) };
};
