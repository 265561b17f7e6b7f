import chalk from 'chalk';
import Table from 'cli-table3';
import { ConfigKey, getConfigManager, isConfigKey } from '../../core/config';

const descriptions: Record<ConfigKey, string> = {
  serviceIndexUrl: 'NuGet V3 service index',
  requestTimeoutMs: '인덱스 요청 타임아웃 (ms)',
  cacheTtlMs: '후보 목록 캐시 TTL (ms)',
  downloadDir: '다운로드 경로',
  downloadTimeoutMs: '다운로드 타임아웃 (ms)',
  includePrerelease: '프리릴리스 포함 여부',
  targetFrameworks: '허용 프레임워크 (비면 전체)',
  logLevel: '로그 레벨',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    if (isConfigKey(key)) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(config[key])));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    const config = getConfigManager().set(key, value);
    const saved = isConfigKey(key) ? config[key] : value;
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(saved)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [22, 42, 30],
  });

  for (const [key, value] of Object.entries(config)) {
    table.push([key, Array.isArray(value) ? value.join(', ') : String(value), isConfigKey(key) ? descriptions[key] : '-']);
  }

  console.log(chalk.cyan(`\n설정 목록 (${configManager.getConfigPath()}):\n`));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
