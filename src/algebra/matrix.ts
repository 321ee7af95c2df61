import { f64, type Precision, type Scalar } from '../scalar/scalar';
import { Vec, type Dim } from './vector';

/**
 * Column-major matrix with C columns of R rows (GLSL `matCxR`), mapping
 * R^C to R^R. Immutable; operand shapes are checked by the type system.
 */
export class Mat<C extends Dim = Dim, R extends Dim = Dim, P extends Precision = Precision> {
  readonly scalar: Scalar<P>;
  readonly cols: C;
  readonly rows: R;
  private readonly columns: readonly Vec<R, P>[];

  constructor(scalar: Scalar<P>, cols: C, rows: R, columns: readonly Vec<R, P>[]) {
    if (columns.length !== cols) {
      throw new RangeError(`Matrix with ${cols} columns built from ${columns.length} columns`);
    }
    for (const column of columns) {
      if (column.size !== rows) {
        throw new RangeError(`Matrix with ${rows} rows built from a column of size ${column.size}`);
      }
    }
    this.scalar = scalar;
    this.cols = cols;
    this.rows = rows;
    this.columns = Object.freeze(columns.slice());
  }

  column(index: number): Vec<R, P> {
    if (!Number.isInteger(index) || index < 0 || index >= this.cols) {
      throw new RangeError(`Column ${index} out of range for matrix with ${this.cols} columns`);
    }
    return this.columns[index];
  }

  get(col: number, row: number): number {
    return this.column(col).get(row);
  }

  /** Column-major component list. */
  toArray(): number[] {
    const out: number[] = [];
    for (const column of this.columns) out.push(...column.toArray());
    return out;
  }

  toFloat32Array(): Float32Array {
    return Float32Array.from(this.toArray());
  }

  // ── Products ──

  /** Matrix times column vector. */
  mulVec(v: Vec<C, P>): Vec<R, P> {
    const s = this.scalar;
    const out = new Array<number>(this.rows).fill(0);
    for (let c = 0; c < this.cols; c++) {
      const column = this.columns[c];
      const k = v.get(c);
      for (let r = 0; r < this.rows; r++) {
        out[r] = s.add(out[r], s.mul(column.get(r), k));
      }
    }
    return new Vec(s, this.rows, out);
  }

  /** Row vector times matrix. */
  vecMul(v: Vec<R, P>): Vec<C, P> {
    return new Vec(this.scalar, this.cols, this.columns.map((column) => column.dot(v)));
  }

  /** Linear-algebraic product: (C×R) · (K×C) = K×R. */
  mul<K extends Dim>(other: Mat<K, C, P>): Mat<K, R, P> {
    const columns: Vec<R, P>[] = [];
    for (let k = 0; k < other.cols; k++) columns.push(this.mulVec(other.column(k)));
    return new Mat(this.scalar, other.cols, this.rows, columns);
  }

  transpose(): Mat<R, C, P> {
    return buildMat(this.scalar, this.rows, this.cols, (c, r) => this.get(r, c));
  }

  // ── Componentwise ──

  add(other: Mat<C, R, P>): Mat<C, R, P> {
    return this.zipColumns(other, (a, b) => a.add(b));
  }

  sub(other: Mat<C, R, P>): Mat<C, R, P> {
    return this.zipColumns(other, (a, b) => a.sub(b));
  }

  scale(k: number): Mat<C, R, P> {
    return new Mat(this.scalar, this.cols, this.rows, this.columns.map((column) => column.mul(k)));
  }

  /** Componentwise product (GLSL matrixCompMult). */
  compMult(other: Mat<C, R, P>): Mat<C, R, P> {
    return this.zipColumns(other, (a, b) => a.mul(b));
  }

  // ── Square matrices ──

  /** Cofactor expansion along the first column. */
  determinant(this: Mat<C, C, P>): number {
    return det(this.scalar, this.toArray(), this.cols);
  }

  /**
   * Adjugate divided by the determinant. A singular matrix is not rejected:
   * the division by zero propagates infinities and NaN.
   */
  inverse(this: Mat<C, C, P>): Mat<C, C, P> {
    const s = this.scalar;
    const n = this.cols;
    const values = this.toArray();
    const d = det(s, values, n);
    // inverse[row r][col c] = cofactor(row c, col r) / det
    return buildMat(s, n, n, (c, r) => {
      const cofactor = det(s, minor(values, n, r, c), n - 1);
      return s.div((c + r) % 2 === 0 ? cofactor : -cofactor, d);
    });
  }

  trace(this: Mat<C, C, P>): number {
    const s = this.scalar;
    let sum = 0;
    for (let i = 0; i < this.cols; i++) sum = s.add(sum, this.get(i, i));
    return sum;
  }

  // ── Comparison ──

  equals(other: Mat<C, R, P>): boolean {
    return this.columns.every((column, c) => column.equals(other.columns[c]));
  }

  isCloseTo(other: Mat<C, R, P>, maxDiff: number): boolean {
    return this.columns.every((column, c) => column.isCloseTo(other.columns[c], maxDiff));
  }

  toString(): string {
    const cols: Dim = this.cols;
    const rows: Dim = this.rows;
    const name = cols === rows ? `mat${cols}` : `mat${cols}x${rows}`;
    return `${name}(${this.columns.map((column) => `(${column.toArray().join(', ')})`).join(', ')})`;
  }

  private zipColumns(other: Mat<C, R, P>, op: (a: Vec<R, P>, b: Vec<R, P>) => Vec<R, P>): Mat<C, R, P> {
    return new Mat(this.scalar, this.cols, this.rows, this.columns.map((column, c) => op(column, other.columns[c])));
  }
}

// ── Determinant helpers (column-major values, n×n) ──

function det(s: Scalar, m: readonly number[], n: number): number {
  if (n === 1) return m[0];
  if (n === 2) return s.sub(s.mul(m[0], m[3]), s.mul(m[2], m[1]));
  let sum = 0;
  for (let r = 0; r < n; r++) {
    const term = s.mul(m[r], det(s, minor(m, n, 0, r), n - 1));
    sum = r % 2 === 0 ? s.add(sum, term) : s.sub(sum, term);
  }
  return sum;
}

/** The (n-1)×(n-1) matrix left after deleting column `skipCol` and row `skipRow`. */
function minor(m: readonly number[], n: number, skipCol: number, skipRow: number): number[] {
  const out: number[] = [];
  for (let c = 0; c < n; c++) {
    if (c === skipCol) continue;
    for (let r = 0; r < n; r++) {
      if (r !== skipRow) out.push(m[c * n + r]);
    }
  }
  return out;
}

function buildMat<C extends Dim, R extends Dim, P extends Precision>(
  scalar: Scalar<P>,
  cols: C,
  rows: R,
  at: (col: number, row: number) => number,
): Mat<C, R, P> {
  const columns: Vec<R, P>[] = [];
  for (let c = 0; c < cols; c++) {
    const values = new Array<number>(rows);
    for (let r = 0; r < rows; r++) values[r] = at(c, r);
    columns.push(new Vec(scalar, rows, values));
  }
  return new Mat(scalar, cols, rows, columns);
}

// ── Constructors (from columns) ──

export function mat2<P extends Precision>(c0: Vec<2, P>, c1: Vec<2, P>): Mat<2, 2, P> {
  return new Mat(c0.scalar, 2, 2, [c0, c1]);
}

export function mat3<P extends Precision>(c0: Vec<3, P>, c1: Vec<3, P>, c2: Vec<3, P>): Mat<3, 3, P> {
  return new Mat(c0.scalar, 3, 3, [c0, c1, c2]);
}

export function mat4<P extends Precision>(c0: Vec<4, P>, c1: Vec<4, P>, c2: Vec<4, P>, c3: Vec<4, P>): Mat<4, 4, P> {
  return new Mat(c0.scalar, 4, 4, [c0, c1, c2, c3]);
}

export function mat2x3<P extends Precision>(c0: Vec<3, P>, c1: Vec<3, P>): Mat<2, 3, P> {
  return new Mat(c0.scalar, 2, 3, [c0, c1]);
}

export function mat2x4<P extends Precision>(c0: Vec<4, P>, c1: Vec<4, P>): Mat<2, 4, P> {
  return new Mat(c0.scalar, 2, 4, [c0, c1]);
}

export function mat3x2<P extends Precision>(c0: Vec<2, P>, c1: Vec<2, P>, c2: Vec<2, P>): Mat<3, 2, P> {
  return new Mat(c0.scalar, 3, 2, [c0, c1, c2]);
}

export function mat3x4<P extends Precision>(c0: Vec<4, P>, c1: Vec<4, P>, c2: Vec<4, P>): Mat<3, 4, P> {
  return new Mat(c0.scalar, 3, 4, [c0, c1, c2]);
}

export function mat4x2<P extends Precision>(c0: Vec<2, P>, c1: Vec<2, P>, c2: Vec<2, P>, c3: Vec<2, P>): Mat<4, 2, P> {
  return new Mat(c0.scalar, 4, 2, [c0, c1, c2, c3]);
}

export function mat4x3<P extends Precision>(c0: Vec<3, P>, c1: Vec<3, P>, c2: Vec<3, P>, c3: Vec<3, P>): Mat<4, 3, P> {
  return new Mat(c0.scalar, 4, 3, [c0, c1, c2, c3]);
}

/** Builds a C×R matrix from `cols * rows` column-major values. */
export function matFromColumnMajor<C extends Dim, R extends Dim>(cols: C, rows: R, values: ArrayLike<number>): Mat<C, R, 'f64'>;
export function matFromColumnMajor<C extends Dim, R extends Dim, P extends Precision>(
  cols: C, rows: R, values: ArrayLike<number>, scalar: Scalar<P>,
): Mat<C, R, P>;
export function matFromColumnMajor<C extends Dim, R extends Dim>(
  cols: C, rows: R, values: ArrayLike<number>, scalar: Scalar = f64,
): Mat<C, R> {
  if (values.length !== cols * rows) {
    throw new RangeError(`A ${cols}x${rows} matrix needs ${cols * rows} values, got ${values.length}`);
  }
  return buildMat(scalar, cols, rows, (c, r) => values[c * rows + r]);
}

export function identity<N extends Dim>(size: N): Mat<N, N, 'f64'>;
export function identity<N extends Dim, P extends Precision>(size: N, scalar: Scalar<P>): Mat<N, N, P>;
export function identity<N extends Dim>(size: N, scalar: Scalar = f64): Mat<N, N> {
  return buildMat(scalar, size, size, (c, r) => (c === r ? 1 : 0));
}
