/**
 * 도메인 오류 정의
 */

import { z } from 'zod';

/**
 * 값 객체 생성 시 불변식 위반
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(entity: string, issues: string[]) {
    super(`${entity} 검증 실패: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(entity: string, error: z.ZodError): ValidationError {
    return new ValidationError(
      entity,
      error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
}

/**
 * 검증되지 않은 융합 전략 호출
 */
export class FusionStrategyNotImplementedError extends Error {
  readonly strategy: string;

  constructor(strategy: string) {
    super(`${strategy} 융합 전략은 구현되지 않았습니다. 검증 전에는 사용할 수 없습니다`);
    this.name = 'FusionStrategyNotImplementedError';
    this.strategy = strategy;
  }
}
