import { EventEmitter } from 'eventemitter3';
import * as path from 'path';
import * as fs from 'fs-extra';
import {
  DownloadProgressEvent,
  IPackageDownloader,
  PackageRef,
  ProgressSink,
  StopPredicate,
} from '../types';
import logger from '../utils/logger';
import { getNuGetDownloader } from './downloaders/nuget';
import { getArchiveFileName, getFullName } from './shared/package-utils';

// 다운로드 아이템 상태
export type DownloadItemStatus = 'pending' | 'downloading' | 'completed' | 'failed' | 'skipped';

// 다운로드 아이템
export interface DownloadItem {
  package: PackageRef;
  filePath: string;
  status: DownloadItemStatus;
  progress: number;
  downloadedBytes: number;
  totalBytes: number;
  speed: number;
  error?: string;
}

// 다운로드 결과
export interface DownloadResult {
  /** 새로 다운로드한 파일 경로 */
  downloaded: string[];
  /** 이미 있어서 건너뛴 파일 경로 */
  skipped: string[];
  stopped: boolean;
  duration: number;
}

// 다운로드 옵션
export interface DownloadOptions {
  outputPath: string;
  stopRequested?: StopPredicate;
  progress?: ProgressSink;
}

// 이벤트 타입
export interface DownloadOrchestratorEvents {
  itemStart: (item: DownloadItem) => void;
  itemProgress: (item: DownloadItem) => void;
  itemComplete: (item: DownloadItem) => void;
  itemSkipped: (item: DownloadItem) => void;
  itemFailed: (item: DownloadItem, error: Error) => void;
}

/**
 * 해결된 패키지를 발견 순서대로 하나씩 다운로드한다.
 * 대상 경로에 파일이 있으면 건너뛰므로 같은 디렉토리로 다시 실행하면 이어서 받는다.
 */
export class DownloadOrchestrator extends EventEmitter<DownloadOrchestratorEvents> {
  private readonly downloader: IPackageDownloader;

  constructor(downloader: IPackageDownloader = getNuGetDownloader()) {
    super();
    this.downloader = downloader;
  }

  async downloadAll(packages: readonly PackageRef[], options: DownloadOptions): Promise<DownloadResult> {
    const stopRequested = options.stopRequested ?? (() => false);
    const progress = options.progress ?? (() => undefined);
    const startTime = Date.now();

    const downloaded: string[] = [];
    const skipped: string[] = [];
    const finish = (stopped: boolean): DownloadResult => ({
      downloaded,
      skipped,
      stopped,
      duration: Date.now() - startTime,
    });

    await fs.ensureDir(options.outputPath);
    logger.info('다운로드 시작', { count: packages.length, outputPath: options.outputPath });

    for (const pkg of packages) {
      if (stopRequested()) {
        logger.info('다운로드 중지 요청', { downloaded: downloaded.length, skipped: skipped.length });
        return finish(true);
      }

      const item: DownloadItem = {
        package: pkg,
        filePath: path.join(options.outputPath, getArchiveFileName(pkg)),
        status: 'pending',
        progress: 0,
        downloadedBytes: 0,
        totalBytes: 0,
        speed: 0,
      };

      if (await fs.pathExists(item.filePath)) {
        item.status = 'skipped';
        progress(`${item.filePath} already downloaded.`);
        skipped.push(item.filePath);
        this.emit('itemSkipped', item);
        continue;
      }

      progress(`downloading ${pkg.id} ${pkg.version}`);
      await this.downloadItem(item);
      downloaded.push(item.filePath);
    }

    logger.info('다운로드 완료', {
      downloaded: downloaded.length,
      skipped: skipped.length,
      duration: Date.now() - startTime,
    });
    return finish(false);
  }

  /**
   * 개별 아이템 다운로드 (실패 시 이벤트 후 재발생)
   */
  private async downloadItem(item: DownloadItem): Promise<void> {
    item.status = 'downloading';
    this.emit('itemStart', item);

    try {
      await this.downloader.downloadArchive(item.package, item.filePath, (event: DownloadProgressEvent) => {
        item.progress = event.progress;
        item.downloadedBytes = event.downloadedBytes;
        item.totalBytes = event.totalBytes;
        item.speed = event.speed;
        this.emit('itemProgress', item);
      });

      item.status = 'completed';
      item.progress = 100;
      this.emit('itemComplete', item);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      item.status = 'failed';
      item.error = err.message;
      logger.error('다운로드 실패', { package: getFullName(item.package), error: err.message });
      this.emit('itemFailed', item, err);
      throw error;
    }
  }
}
