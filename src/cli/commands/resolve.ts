import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager } from '../../core/config';
import { createPackageFetcher } from '../../core/packageFetcher';
import logger from '../../utils/logger';
import { applyCommandConfig, buildFetchRequest, FetchCommandOptions } from '../request';

/**
 * resolve 명령어 핸들러 (다운로드 없이 의존성 클로저 표시)
 */
export async function resolveCommand(options: FetchCommandOptions): Promise<void> {
  try {
    await logger.initialize();

    const config = applyCommandConfig(options, getConfigManager().getConfig());
    const request = buildFetchRequest(options, config);
    const fetcher = createPackageFetcher(config);

    console.log(chalk.cyan(`'${request.packageId}' 의존성 해결 중...`));

    const result = await fetcher.resolveClosure(request, {
      progress: (message) => console.log(chalk.gray(message)),
    });

    if (result.status === 'failed') {
      console.error(chalk.red(`✗ ${result.error ?? '의존성 해결 실패'}`));
      process.exit(1);
    }

    const table = new Table({
      head: [chalk.cyan('패키지'), chalk.cyan('버전'), chalk.cyan('프리릴리스'), chalk.cyan('최신')],
      colWidths: [40, 20, 12, 8],
    });

    for (const pkg of result.resolved) {
      table.push([pkg.id, pkg.version, pkg.isPrerelease ? 'yes' : '', pkg.isLatestRelease ? 'yes' : '']);
    }

    console.log(chalk.green(`\n✓ ${result.resolved.length}개 패키지`));
    console.log(table.toString());

    if (result.unresolved.length > 0) {
      console.log(chalk.yellow(`\n해결하지 못한 의존성 (${result.unresolved.length}개):`));
      for (const dep of result.unresolved) {
        console.log(chalk.yellow(`  - ${dep.parent} -> ${dep.id} ${dep.range || '(*)'} (${dep.reason})`));
      }
    }
  } catch (error) {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
