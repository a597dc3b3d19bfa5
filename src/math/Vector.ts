import { ComponentIndexError, DegenerateVectorError, DimensionMismatchError } from '../utils/errors';

export type Dimension = 2 | 3 | 4;

export const DEFAULT_EPSILON = 1e-5;

/**
 * Fixed-size vector of `dimension` floating-point components.
 * Arithmetic never mutates; only `set` and the component setters do.
 */
export class Vector<N extends Dimension = Dimension> {
  public readonly dimension: N;
  private components: number[];

  constructor(dimension: N, components?: readonly number[]) {
    if (components && components.length !== dimension) {
      throw new DimensionMismatchError(dimension, components.length);
    }
    this.dimension = dimension;
    this.components = components ? [...components] : new Array<number>(dimension).fill(0);
  }

  static zero<N extends Dimension>(dimension: N): Vector<N> {
    return new Vector(dimension);
  }

  // ---------- component access ----------
  get(index: number): number {
    this.checkIndex(index);
    return this.components[index];
  }

  set(index: number, value: number): this {
    this.checkIndex(index);
    this.components[index] = value;
    return this;
  }

  get x(): number { return this.get(0); }
  set x(value: number) { this.set(0, value); }
  get y(): number { return this.get(1); }
  set y(value: number) { this.set(1, value); }
  get z(): number { return this.get(2); }
  set z(value: number) { this.set(2, value); }
  get w(): number { return this.get(3); }
  set w(value: number) { this.set(3, value); }

  // ---------- non‑mutating arithmetic ----------
  add(v: Vector<N>): Vector<N> {
    this.checkDimension(v);
    return this.map((c, i) => c + v.components[i]);
  }

  subtract(v: Vector<N>): Vector<N> {
    this.checkDimension(v);
    return this.map((c, i) => c - v.components[i]);
  }

  scale(s: number): Vector<N>  { return this.map((c) => c * s); }
  divide(s: number): Vector<N> { return this.map((c) => c / s); }
  negate(): Vector<N>          { return this.map((c) => -c); }

  magnitudeSquared(): number { return Vector.dot(this, this); }
  magnitude(): number        { return Math.sqrt(this.magnitudeSquared()); }

  normalize(): Vector<N> {
    const l = this.magnitude();
    if (l === 0) throw new DegenerateVectorError('normalize');
    return this.divide(l);
  }

  static add<N extends Dimension>(a: Vector<N>, b: Vector<N>): Vector<N>      { return a.add(b); }
  static subtract<N extends Dimension>(a: Vector<N>, b: Vector<N>): Vector<N> { return a.subtract(b); }
  static scale<N extends Dimension>(s: number, v: Vector<N>): Vector<N>       { return v.scale(s); }

  static dot<N extends Dimension>(a: Vector<N>, b: Vector<N>): number {
    a.checkDimension(b);
    return a.components.reduce((sum, c, i) => sum + c * b.components[i], 0);
  }

  // ---------- comparison & formatting ----------
  /** Exact component-wise equality; rounding differences make this false. */
  equals(v: Vector<N>): boolean {
    return this.dimension === v.dimension && this.components.every((c, i) => c === v.components[i]);
  }

  /** Component-wise comparison within `epsilon`, relative once components exceed 1. */
  approxEquals(v: Vector<N>, epsilon = DEFAULT_EPSILON): boolean {
    if (this.dimension !== v.dimension) return false;
    return this.components.every((c, i) => {
      const other = v.components[i];
      return Math.abs(c - other) <= epsilon * Math.max(1, Math.abs(c), Math.abs(other));
    });
  }

  clone(): Vector<N> { return new Vector(this.dimension, this.components); }
  toArray(): number[] { return [...this.components]; }
  toString(): string { return `(${this.components.join(', ')})`; }

  private map(fn: (component: number, index: number) => number): Vector<N> {
    return new Vector(this.dimension, this.components.map(fn));
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.dimension) {
      throw new ComponentIndexError(index, this.dimension);
    }
  }

  private checkDimension(v: Vector<Dimension>): void {
    if (v.dimension !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, v.dimension);
    }
  }
}

export type Vector2D = Vector<2>;
export type Vector3D = Vector<3>;
export type Vector4D = Vector<4>;

export const vec2 = (x = 0, y = 0): Vector2D => new Vector(2, [x, y]);
export const vec3 = (x = 0, y = 0, z = 0): Vector3D => new Vector(3, [x, y, z]);
export const vec4 = (x = 0, y = 0, z = 0, w = 0): Vector4D => new Vector(4, [x, y, z, w]);
