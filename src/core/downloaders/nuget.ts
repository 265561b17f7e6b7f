/**
 * NuGet 패키지 아카이브 다운로더
 *
 * .nupkg 파일을 `<파일>.part`로 스트리밍한 뒤 완료 시 최종 경로로 이름을 바꾼다.
 * 실패하면 임시 파일을 지우므로 최종 경로에는 완성된 파일만 남는다.
 */

import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs-extra';
import { Readable } from 'stream';
import { DownloadProgressEvent, IPackageDownloader, PackageRef } from '../../types';
import logger from '../../utils/logger';
import { toTransportFailure } from '../shared/errors';
import { getFullName } from '../shared/package-utils';

const DEFAULT_DOWNLOAD_TIMEOUT = 300000;
const PARTIAL_SUFFIX = '.part';

// 속도 계산 주기 (초)
const SPEED_SAMPLE_INTERVAL = 0.3;

export interface NuGetDownloaderOptions {
  timeout?: number;
}

function parseContentLength(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

export class NuGetDownloader implements IPackageDownloader {
  private readonly client: AxiosInstance;

  constructor(options: NuGetDownloaderOptions = {}) {
    this.client = axios.create({
      timeout: options.timeout ?? DEFAULT_DOWNLOAD_TIMEOUT,
      headers: {
        Accept: 'application/octet-stream',
      },
    });
  }

  /**
   * 패키지 아카이브를 filePath로 다운로드
   */
  async downloadArchive(
    pkg: PackageRef,
    filePath: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<void> {
    const partialPath = `${filePath}${PARTIAL_SUFFIX}`;
    const itemId = getFullName(pkg);

    try {
      const response = await this.client.get<Readable>(pkg.downloadUrl, {
        responseType: 'stream',
      });

      const totalBytes = parseContentLength(response.headers['content-length']);
      let downloadedBytes = 0;
      let lastBytes = 0;
      let lastTime = Date.now();
      let currentSpeed = 0;

      const writer = fs.createWriteStream(partialPath);

      response.data.on('data', (chunk: Buffer) => {
        downloadedBytes += chunk.length;

        const now = Date.now();
        const elapsed = (now - lastTime) / 1000;
        if (elapsed >= SPEED_SAMPLE_INTERVAL) {
          currentSpeed = (downloadedBytes - lastBytes) / elapsed;
          lastBytes = downloadedBytes;
          lastTime = now;
        }

        if (onProgress) {
          onProgress({
            itemId,
            progress: totalBytes > 0 ? (downloadedBytes / totalBytes) * 100 : 0,
            downloadedBytes,
            totalBytes,
            speed: currentSpeed,
          });
        }
      });

      await new Promise<void>((resolve, reject) => {
        // 원본 스트림 에러 시 파일 핸들을 닫은 뒤 실패 처리
        response.data.on('error', (error) => {
          writer.once('close', () => reject(error));
          writer.destroy();
        });
        writer.on('finish', resolve);
        writer.on('error', reject);
        response.data.pipe(writer);
      });

      await fs.move(partialPath, filePath, { overwrite: true });
      logger.info('패키지 다운로드 완료', { package: itemId, filePath, bytes: downloadedBytes });
    } catch (error) {
      await fs.remove(partialPath);
      logger.error('패키지 다운로드 실패', { package: itemId, url: pkg.downloadUrl, error: String(error) });
      throw toTransportFailure(error, `다운로드 실패 (${itemId})`);
    }
  }
}

// 싱글톤 인스턴스
let nugetDownloaderInstance: NuGetDownloader | null = null;

export function getNuGetDownloader(): NuGetDownloader {
  if (!nugetDownloaderInstance) {
    nugetDownloaderInstance = new NuGetDownloader();
  }
  return nugetDownloaderInstance;
}
