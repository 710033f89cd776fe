/**
 * 시드 기반 난수 생성기 (재현성 확보)
 *
 * mulberry32 + Box-Muller 가우시안.
 * 뽑는 순서가 결과를 결정하므로 호출 순서를 바꾸면 재현성이 깨진다.
 */

export class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
  }

  /**
   * [0, 1) 균등 분포
   */
  next(): number {
    let t = this.seed += 0x6D2B79F5;
    t = Math.imul(t ^ t >>> 15, t | 1);
    t ^= t + Math.imul(t ^ t >>> 7, t | 61);
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  }

  /**
   * [min, max) 균등 분포
   */
  uniform(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  /**
   * 가우시안 노이즈 (Box-Muller 변환)
   */
  normal(mean: number = 0, sigma: number = 1): number {
    const u1 = 1 - this.next(); // (0, 1]
    const u2 = this.next();
    const z0 = Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2.0 * Math.PI * u2);
    return z0 * sigma + mean;
  }

  /**
   * 축별 표준편차를 가진 가우시안 벡터
   */
  normalVector(sigmas: readonly number[]): number[] {
    return sigmas.map((sigma) => this.normal(0, sigma));
  }

  /**
   * 베르누이 시행
   */
  chance(probability: number): boolean {
    return this.next() < probability;
  }
}

/**
 * 틱별 생성기: 실행 시드 + 틱 번호
 */
export function createTickRandom(runSeed: number, tick: number): SeededRandom {
  return new SeededRandom(runSeed + tick);
}
