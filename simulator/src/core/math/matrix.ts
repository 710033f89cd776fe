/**
 * 행렬/벡터 유틸리티
 */

/**
 * 값을 범위 내로 제한
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 대각 행렬 생성
 */
export function diagonalMatrix(diag: readonly number[]): number[][] {
  const n = diag.length;
  const result: number[][] = [];
  for (let i = 0; i < n; i++) {
    result[i] = [];
    for (let j = 0; j < n; j++) {
      result[i][j] = i === j ? diag[i] : 0;
    }
  }
  return result;
}

/**
 * 대각합: tr(A)
 */
export function trace(A: readonly (readonly number[])[]): number {
  let sum = 0;
  for (let i = 0; i < A.length; i++) {
    sum += A[i][i];
  }
  return sum;
}

/**
 * 원소별 제곱
 */
export function squared(v: readonly number[]): number[] {
  return v.map((x) => x * x);
}

/**
 * 벡터 덧셈
 */
export function vectorAdd(a: readonly number[], b: readonly number[]): number[] {
  return a.map((x, i) => x + b[i]);
}

/**
 * 벡터 스칼라 곱
 */
export function vectorScale(c: number, v: readonly number[]): number[] {
  return v.map((x) => c * x);
}
