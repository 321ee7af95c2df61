// shadermath: GLSL-style vector/matrix algebra and procedural noise
// for host code. Everything here is pure and synchronous.

// ── Scalars ──

export { f32, f64, type Precision, type Scalar } from './scalar/scalar';

// ── Algebra ──

export {
  Vec, vec2, vec3, vec4, vecFromArray, splat, isVecOfSize,
  type Dim, type AnyVec,
} from './algebra/vector';
export {
  Mat, mat2, mat3, mat4, mat2x3, mat2x4, mat3x2, mat3x4, mat4x2, mat4x3,
  matFromColumnMajor, identity,
} from './algebra/matrix';
export { translate, scale, rotate, perspective, ortho, lookAt, type Mat4 } from './algebra/transform';

// ── GLSL built-ins ──

export {
  dot, length, lengthSquared, distance, cross, normalize,
  faceforward, reflect, refract, mix, projection, isPerpendicular,
} from './builtin/geometric';
export {
  matrixCompMult, outerProduct, transpose, determinant, inverse, trace, isInvertible,
} from './builtin/matrix';
export { noise1, noise2, noise3, noise4 } from './builtin/noise';

// ── Noise ──

export {
  classicNoise1, classicNoise2, classicNoise3, classicNoise4,
  periodicClassicNoise1, periodicClassicNoise2, periodicClassicNoise3, periodicClassicNoise4,
} from './noise/classic';
export {
  simplexNoise1, simplexNoise2, simplexNoise3, simplexNoise4,
  simplexNoiseWithDerivative1, simplexNoiseWithDerivative2,
  simplexNoiseWithDerivative3, simplexNoiseWithDerivative4,
} from './noise/simplex';
export {
  periodicSimplexNoise1, periodicSimplexNoise2, periodicSimplexNoise3, periodicSimplexNoise4,
} from './noise/periodic-simplex';
export { classicNoise, simplexNoise, periodicSimplexNoise, simplexNoiseWithDerivative } from './noise/dispatch';
export { fractalNoise } from './noise/fractal';
export {
  defaultFractalParams,
  type FractalParams, type NoiseBasis, type NoiseDerivative, type NoisePoint,
} from './noise/types';
