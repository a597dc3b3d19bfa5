import { config } from '../config/env';
import logger from '../utils/logger';
import { Vector3D, vec3 } from '../math/Vector';
import { decompose, project } from '../math/projection';
import { RandomSource } from './random';

export interface DemoReport {
  title: string;
  lines: string[];
}

export interface DemoOptions {
  range: number;      // components drawn from [-range, range)
  pushRange: number;  // cart push force drawn from [-pushRange, pushRange)
}

const randomVector3 = (random: RandomSource, min: number, max: number): Vector3D => {
  return vec3(random.randFloat(min, max), random.randFloat(min, max), random.randFloat(min, max));
};

export const showNonCommutativity = (random: RandomSource, range: number): DemoReport => {
  const a = randomVector3(random, -range, range);
  const b = randomVector3(random, -range, range);
  return {
    title: 'Projection is not commutative',
    lines: [
      `a = ${a}, b = ${b}`,
      `proj_b(a) = ${project(a, b)}`,
      `proj_a(b) = ${project(b, a)}`,
    ],
  };
};

// The cart can only roll along the track, so only the part of the push
// parallel to the track moves it.
export const pushCart = (random: RandomSource, pushRange: number): DemoReport => {
  const push = randomVector3(random, -pushRange, pushRange);
  const track = vec3(1, 0, 0);
  return {
    title: 'Pushing a cart along a track',
    lines: [
      `Fpush: ${push}`,
      `F = proj_d(Fpush) = ${project(push, track)}`,
    ],
  };
};

export const showDecomposition = (random: RandomSource): DemoReport => {
  const a = randomVector3(random, 0, 1);
  const b = randomVector3(random, 0, 1);
  const { parallel, perpendicular } = decompose(a, b);
  const sum = parallel.add(perpendicular);

  const lines = [
    `a = ${a}, b = ${b}`,
    `aParallel = ${parallel}, aPerp = ${perpendicular}`,
  ];
  if (sum.approxEquals(a)) {
    lines.push(`Hence ${parallel} + ${perpendicular} = ${a}`);
  } else {
    lines.push(`${parallel} + ${perpendicular} = ${sum}, expected ${a}`);
  }
  lines.push(`Exact floating-point equality: ${sum.equals(a) ? 'yes' : 'no'}`);

  return { title: 'Decomposing a into parts parallel and perpendicular to b', lines };
};

export const runDemo = (
  random: RandomSource,
  options: DemoOptions = { range: config.demoRange, pushRange: config.pushRange }
): DemoReport[] => {
  return [
    showNonCommutativity(random, options.range),
    pushCart(random, options.pushRange),
    showDecomposition(random),
  ];
};

export const logReport = (report: DemoReport): void => {
  logger.info(report.title);
  report.lines.forEach((line) => logger.info(line));
};
