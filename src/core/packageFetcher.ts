/**
 * 패키지 가져오기 실행 드라이버
 *
 * 루트 해결 → 의존성 그래프 → 다운로드를 순서대로 실행한다.
 * 각 단계 사이에 중지 요청을 확인하고, 진행 상황은 ProgressSink로 한 줄씩 보고한다.
 */

import {
  FetchRequest,
  FetchResult,
  IPackageDownloader,
  PackageIndex,
  PackageRef,
  ProgressSink,
  StopPredicate,
} from '../types';
import logger from '../utils/logger';
import { Config } from './config';
import { DownloadOrchestrator } from './downloadOrchestrator';
import { NuGetDownloader } from './downloaders/nuget';
import { DependencyGraphBuilder } from './resolver/dependencyGraphBuilder';
import { VersionResolver } from './resolver/versionResolver';
import { isNuGetFetchError } from './shared/errors';
import { NuGetIndexClient } from './shared/nuget-cache';
import { getFullName } from './shared/package-utils';

export interface FetchOptions {
  stopRequested?: StopPredicate;
  progress?: ProgressSink;
}

// 진행 메시지
export const MESSAGES = {
  stopped: 'Stopped.',
  done: 'Done.',
  invalidVersion: 'Unable to parse package version.',
  notFound: 'Package not found.',
  packagesToDownload: (count: number) => `${count} packages to download.`,
  failure: (message: string) => `Error: ${message}`,
} as const;

// 실패 메시지를 보고한 뒤 호출자에게 다시 던짐
function reportAndRethrow(progress: ProgressSink, error: unknown): never {
  progress(MESSAGES.failure(error instanceof Error ? error.message : String(error)));
  throw error;
}

/**
 * AbortSignal을 중지 조건으로 변환
 */
export function stopPredicateFromSignal(signal: AbortSignal): StopPredicate {
  return () => signal.aborted;
}

export class PackageFetcher {
  readonly resolver: VersionResolver;
  readonly graphBuilder: DependencyGraphBuilder;
  /** 다운로드 이벤트 구독용 (진행률 표시) */
  readonly orchestrator: DownloadOrchestrator;

  constructor(index: PackageIndex, downloader?: IPackageDownloader) {
    this.resolver = new VersionResolver(index);
    this.graphBuilder = new DependencyGraphBuilder(this.resolver);
    this.orchestrator = new DownloadOrchestrator(downloader);
  }

  /**
   * 루트 패키지와 전체 의존성 클로저 해결 (다운로드 없음)
   */
  async resolveClosure(request: FetchRequest, options: FetchOptions = {}): Promise<FetchResult> {
    const progress = options.progress ?? (() => undefined);
    try {
      return await this.runClosure(request, options.stopRequested ?? (() => false), progress);
    } catch (error) {
      return reportAndRethrow(progress, error);
    }
  }

  /**
   * 해결 후 다운로드까지 실행
   */
  async processPackage(request: FetchRequest, options: FetchOptions = {}): Promise<FetchResult> {
    const stopRequested = options.stopRequested ?? (() => false);
    const progress = options.progress ?? (() => undefined);
    try {
      return await this.runPackage(request, stopRequested, progress);
    } catch (error) {
      return reportAndRethrow(progress, error);
    }
  }

  private async runClosure(
    request: FetchRequest,
    stopRequested: StopPredicate,
    progress: ProgressSink
  ): Promise<FetchResult> {
    const result: FetchResult = {
      status: 'done',
      resolved: [],
      unresolved: [],
      downloaded: [],
      skipped: [],
    };

    if (stopRequested()) {
      progress(MESSAGES.stopped);
      return { ...result, status: 'stopped' };
    }

    let root: PackageRef;
    try {
      root = await this.resolveRoot(request);
    } catch (error) {
      if (isNuGetFetchError(error, 'InvalidVersion')) {
        progress(MESSAGES.invalidVersion);
        return { ...result, status: 'failed', error: error.message };
      }
      if (isNuGetFetchError(error, 'PackageNotFound')) {
        progress(MESSAGES.notFound);
        return { ...result, status: 'failed', error: error.message };
      }
      throw error;
    }

    progress(getFullName(root));

    const graph = await this.graphBuilder.build(root, {
      includePrerelease: request.includePrerelease,
      targetFrameworks: request.targetFrameworks,
      stopRequested,
      progress,
    });

    result.resolved = graph.resolved;
    result.unresolved = graph.unresolved;

    if (graph.stopped || stopRequested()) {
      progress(MESSAGES.stopped);
      return { ...result, status: 'stopped' };
    }

    return result;
  }

  private async runPackage(
    request: FetchRequest,
    stopRequested: StopPredicate,
    progress: ProgressSink
  ): Promise<FetchResult> {
    logger.info('패키지 처리 시작', {
      packageId: request.packageId,
      version: request.version,
      includePrerelease: request.includePrerelease,
      downloadDir: request.downloadDir,
    });

    const closure = await this.runClosure(request, stopRequested, progress);
    if (closure.status !== 'done') {
      return closure;
    }

    progress(MESSAGES.packagesToDownload(closure.resolved.length));

    const download = await this.orchestrator.downloadAll(closure.resolved, {
      outputPath: request.downloadDir,
      stopRequested,
      progress,
    });

    const result: FetchResult = {
      ...closure,
      downloaded: download.downloaded,
      skipped: download.skipped,
    };

    if (download.stopped || stopRequested()) {
      progress(MESSAGES.stopped);
      return { ...result, status: 'stopped' };
    }

    progress(MESSAGES.done);
    logger.info('패키지 처리 완료', {
      packageId: request.packageId,
      resolved: result.resolved.length,
      downloaded: result.downloaded.length,
      skipped: result.skipped.length,
    });
    return result;
  }

  private resolveRoot(request: FetchRequest): Promise<PackageRef> {
    const version = request.version?.trim();
    if (!version) {
      return this.resolver.resolveLatest(request.packageId, request.includePrerelease);
    }
    return this.resolver.resolveExact(request.packageId, version);
  }
}

/**
 * 설정값으로 NuGet 서버를 사용하는 PackageFetcher 생성
 */
export function createPackageFetcher(config: Config): PackageFetcher {
  const index = new NuGetIndexClient({
    serviceIndexUrl: config.serviceIndexUrl,
    timeout: config.requestTimeoutMs,
    ttl: config.cacheTtlMs,
  });
  const downloader = new NuGetDownloader({ timeout: config.downloadTimeoutMs });
  return new PackageFetcher(index, downloader);
}
