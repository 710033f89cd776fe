/**
 * 배치 실행 스크립트
 *
 * 사용법:
 *   npm run batch -- --seed 42 --ticks 300 --env "GNSS Degraded / Spoof Risk" --out ./logs/batch
 *
 * 옵션:
 *   --seed <정수>        실행 시드 (기본: 1)
 *   --ticks <정수>       실행 틱 수 (기본: 300)
 *   --env <이름>         환경 프로필
 *   --envelope <이름>    비행 포락선
 *   --area <이름>        작전 구역
 *   --threshold <이름>   거버넌스 임계값 프리셋
 *   --strategy <이름>    융합 전략 (weighted | kalman)
 *   --out <디렉토리>     telemetry.jsonl / audit.jsonl 저장 위치
 */

import { ScenarioSelection } from '../../../shared/schemas';
import { getConfig } from '../config';
import { loadFusionConfig } from '../config/fusionConfig';
import { BatchRunner } from '../batch/batchRunner';

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    console.error(`Error: ${name} 에 값이 필요합니다`);
    process.exit(1);
  }
  return value;
}

function integerOption(args: string[], name: string, fallback: number): number {
  const raw = optionValue(args, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    console.error(`Error: Invalid ${name} "${raw}". 0 이상의 정수를 사용하세요.`);
    process.exit(1);
  }
  return parseInt(raw, 10);
}

function main(): void {
  const args = process.argv.slice(2);

  const seed = integerOption(args, '--seed', 1);
  const ticks = integerOption(args, '--ticks', 300);
  const outputDir = optionValue(args, '--out');

  const scenario: Partial<ScenarioSelection> = {};
  const env = optionValue(args, '--env');
  const envelope = optionValue(args, '--envelope');
  const area = optionValue(args, '--area');
  const threshold = optionValue(args, '--threshold');
  const strategy = optionValue(args, '--strategy');
  if (env !== undefined) scenario.environmentName = env;
  if (envelope !== undefined) scenario.envelopeName = envelope;
  if (area !== undefined) scenario.areaName = area;
  if (threshold !== undefined) scenario.thresholdName = threshold;
  if (strategy !== undefined) scenario.fusionStrategyName = strategy;

  const { config: fusionConfig } = loadFusionConfig(getConfig().fusionConfigPath);

  const summary = new BatchRunner().run({
    seed,
    ticks,
    scenario,
    outputDir,
    fusionConfig,
    verbose: true,
  });

  console.log(JSON.stringify(summary, null, 2));

  if (!summary.allAuditVerified) {
    console.error('[Batch] 감사 레코드 검증 실패');
    process.exit(2);
  }
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    console.error('[Batch] 실행 실패:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
