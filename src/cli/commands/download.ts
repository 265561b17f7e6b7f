import cliProgress from 'cli-progress';
import chalk from 'chalk';
import { getConfigManager } from '../../core/config';
import { createPackageFetcher, stopPredicateFromSignal } from '../../core/packageFetcher';
import { getFullName } from '../../core/shared/package-utils';
import logger from '../../utils/logger';
import { applyCommandConfig, buildFetchRequest, FetchCommandOptions } from '../request';

// Ctrl+C로 중지된 실행의 종료 코드
const EXIT_STOPPED = 130;

/**
 * download 명령어 핸들러
 */
export async function downloadCommand(options: FetchCommandOptions): Promise<void> {
  const controller = new AbortController();

  // 첫 Ctrl+C는 현재 단계가 끝난 뒤 중지, 두 번째는 즉시 종료
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_STOPPED);
    }
    console.log(chalk.yellow('\n현재 단계가 끝나면 중지합니다 (다시 누르면 즉시 종료)'));
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const progressBar = new cliProgress.SingleBar(
    {
      clearOnComplete: true,
      hideCursor: true,
      format: ' {bar} | {filename} | {percentage}% | {speed}',
    },
    cliProgress.Presets.shades_classic
  );
  let barActive = false;
  const stopBar = () => {
    if (barActive) {
      progressBar.stop();
      barActive = false;
    }
  };

  try {
    await logger.initialize();

    const config = applyCommandConfig(options, getConfigManager().getConfig());
    const request = buildFetchRequest(options, config);
    const fetcher = createPackageFetcher(config);

    console.log(chalk.cyan(`출력 경로: ${request.downloadDir}`));

    // 진행률 바 (패키지 하나씩)
    fetcher.orchestrator.on('itemStart', (item) => {
      progressBar.start(1, 0, { filename: getFullName(item.package), speed: 'N/A' });
      barActive = true;
    });
    fetcher.orchestrator.on('itemProgress', (item) => {
      if (item.totalBytes > 0) {
        progressBar.setTotal(item.totalBytes);
      }
      progressBar.update(item.downloadedBytes, { speed: formatSpeed(item.speed) });
    });
    fetcher.orchestrator.on('itemComplete', stopBar);
    fetcher.orchestrator.on('itemFailed', stopBar);

    const result = await fetcher.processPackage(request, {
      stopRequested: stopPredicateFromSignal(controller.signal),
      progress: (message) => console.log(message),
    });

    if (result.status === 'failed') {
      console.error(chalk.red(`✗ ${result.error ?? '다운로드 실패'}`));
      process.exit(1);
    }

    if (result.unresolved.length > 0) {
      console.log(chalk.yellow(`⚠ 해결하지 못한 의존성 ${result.unresolved.length}개`));
    }

    if (result.status === 'stopped') {
      process.exit(EXIT_STOPPED);
    }

    console.log(
      chalk.green(`✓ 다운로드 ${result.downloaded.length}개, 건너뜀 ${result.skipped.length}개`)
    );
  } catch (error) {
    stopBar();
    console.log(chalk.red('✗ 다운로드 실패'));
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/**
 * 바이트 포맷
 */
function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.max(0, Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1));
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * 속도 포맷
 */
function formatSpeed(bytesPerSecond: number): string {
  return formatBytes(bytesPerSecond) + '/s';
}
