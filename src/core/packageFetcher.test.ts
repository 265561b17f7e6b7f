/**
 * PackageFetcher 단위 테스트
 *
 * 인메모리 인덱스/다운로더로 전체 실행 흐름과 진행 메시지 순서를 테스트합니다.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { PackageFetcher, createPackageFetcher, stopPredicateFromSignal } from './packageFetcher';
import { createPackage, InMemoryDownloader, InMemoryPackageIndex } from '../test-utils/nuget-fixtures';
import { NuGetFetchError, isNuGetFetchError } from './shared/errors';
import { DEFAULT_CONFIG } from './config';
import { FetchRequest, PackageIndex } from '../types';

const buildIndex = () =>
  new InMemoryPackageIndex([
    createPackage('App.Core', '1.0.0', {
      dependencies: [
        { id: 'Lib.Json', range: '[2.0.0, 3.0.0)' },
        { id: 'Lib.Logging', range: '1.0.0' },
      ],
    }),
    createPackage('App.Core', '1.1.0', { dependencies: [{ id: 'Lib.Json', range: '2.0.0' }] }),
    createPackage('App.Core', '2.0.0-beta', {}),
    createPackage('Lib.Json', '2.0.0'),
    createPackage('Lib.Json', '2.5.0', { dependencies: [{ id: 'Lib.Logging', range: '1.0.0' }] }),
    createPackage('Lib.Json', '3.0.0'),
    createPackage('Lib.Logging', '1.2.0'),
  ]);

describe('PackageFetcher 단위 테스트', () => {
  let tempDir: string;
  let index: InMemoryPackageIndex;
  let downloader: InMemoryDownloader;
  let progress: string[];

  const request = (overrides: Partial<FetchRequest> = {}): FetchRequest => ({
    packageId: 'App.Core',
    version: '1.0.0',
    includePrerelease: false,
    downloadDir: path.join(tempDir, 'download'),
    targetFrameworks: [],
    ...overrides,
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'package-fetcher-test-'));
    index = buildIndex();
    downloader = new InMemoryDownloader();
    progress = [];
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  const sink = (message: string) => {
    progress.push(message);
  };

  describe('processPackage', () => {
    it('해결, 다운로드, 완료 메시지를 순서대로 보고', async () => {
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request(), { progress: sink });

      expect(result.status).toBe('done');
      expect(result.resolved.map((p) => `${p.id} ${p.version}`)).toEqual([
        'App.Core 1.0.0',
        'Lib.Json 2.5.0',
        'Lib.Logging 1.2.0',
      ]);
      expect(progress).toEqual([
        'App.Core 1.0.0',
        'App.Core 1.0.0 -> Lib.Json 2.5.0',
        'Lib.Json 2.5.0 -> Lib.Logging 1.2.0',
        'App.Core 1.0.0 -> Lib.Logging 1.2.0',
        '3 packages to download.',
        'downloading App.Core 1.0.0',
        'downloading Lib.Json 2.5.0',
        'downloading Lib.Logging 1.2.0',
        'Done.',
      ]);
      expect(downloader.transfers).toEqual(['App.Core 1.0.0', 'Lib.Json 2.5.0', 'Lib.Logging 1.2.0']);
    });

    it('버전을 비우면 최신 정식 릴리스를 루트로 사용', async () => {
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request({ version: '  ' }), { progress: sink });

      expect(result.resolved[0].version).toBe('1.1.0');
      expect(progress[0]).toBe('App.Core 1.1.0');
    });

    it('프리릴리스 포함이면 최신 프리릴리스를 루트로 사용', async () => {
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(
        request({ version: undefined, includePrerelease: true }),
        { progress: sink }
      );

      expect(result.resolved.map((p) => p.version)).toEqual(['2.0.0-beta']);
    });

    it('두 번째 실행은 모두 건너뜀', async () => {
      const fetcher = new PackageFetcher(index, downloader);
      await fetcher.processPackage(request());

      const second = new InMemoryDownloader();
      const result = await new PackageFetcher(index, second).processPackage(request(), { progress: sink });

      expect(result.status).toBe('done');
      expect(second.transfers).toEqual([]);
      expect(result.downloaded).toEqual([]);
      expect(result.skipped).toHaveLength(3);
      expect(progress.filter((line) => line.endsWith('already downloaded.'))).toHaveLength(3);
    });

    it('잘못된 버전은 인덱스 조회와 다운로드 없이 실패', async () => {
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request({ version: '1.0.0.0.0' }), { progress: sink });

      expect(result.status).toBe('failed');
      expect(progress).toEqual(['Unable to parse package version.']);
      expect(index.queries).toEqual([]);
      expect(await fs.pathExists(path.join(tempDir, 'download'))).toBe(false);
    });

    it('없는 패키지는 Package not found.', async () => {
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request({ packageId: 'No.Such' }), { progress: sink });

      expect(result.status).toBe('failed');
      expect(progress).toEqual(['Package not found.']);
      expect(downloader.transfers).toEqual([]);
    });

    it('없는 버전도 Package not found.', async () => {
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request({ version: '9.0.0' }), { progress: sink });

      expect(result.status).toBe('failed');
      expect(progress).toEqual(['Package not found.']);
    });

    it('시작 전 중지 요청이면 아무것도 하지 않음', async () => {
      const controller = new AbortController();
      controller.abort();
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request(), {
        progress: sink,
        stopRequested: stopPredicateFromSignal(controller.signal),
      });

      expect(result.status).toBe('stopped');
      expect(progress).toEqual(['Stopped.']);
      expect(index.queries).toEqual([]);
    });

    it('그래프 탐색 중 중지 요청이면 부분 결과와 Stopped.', async () => {
      const controller = new AbortController();
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request(), {
        progress: (message) => {
          sink(message);
          if (message === 'App.Core 1.0.0 -> Lib.Json 2.5.0') {
            controller.abort();
          }
        },
        stopRequested: stopPredicateFromSignal(controller.signal),
      });

      expect(result.status).toBe('stopped');
      expect(result.resolved.map((p) => p.id)).toEqual(['App.Core', 'Lib.Json']);
      expect(progress).toEqual(['App.Core 1.0.0', 'App.Core 1.0.0 -> Lib.Json 2.5.0', 'Stopped.']);
      expect(downloader.transfers).toEqual([]);
    });

    it('그래프 해결 후 중지 요청이면 다운로드하지 않음', async () => {
      const controller = new AbortController();
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request(), {
        progress: (message) => {
          sink(message);
          if (message === 'App.Core 1.0.0 -> Lib.Logging 1.2.0') {
            controller.abort();
          }
        },
        stopRequested: stopPredicateFromSignal(controller.signal),
      });

      expect(result.status).toBe('stopped');
      expect(result.resolved).toHaveLength(3);
      expect(progress[progress.length - 1]).toBe('Stopped.');
      expect(progress).not.toContain('3 packages to download.');
      expect(downloader.transfers).toEqual([]);
    });

    it('다운로드 도중 중지 요청이면 남은 패키지는 건너뜀', async () => {
      const controller = new AbortController();
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.processPackage(request(), {
        progress: (message) => {
          sink(message);
          if (message === 'downloading App.Core 1.0.0') {
            controller.abort();
          }
        },
        stopRequested: stopPredicateFromSignal(controller.signal),
      });

      expect(result.status).toBe('stopped');
      expect(downloader.transfers).toEqual(['App.Core 1.0.0']);
      expect(progress.slice(-2)).toEqual(['downloading App.Core 1.0.0', 'Stopped.']);
      expect(progress).not.toContain('Done.');
    });

    it('전송 실패는 전파', async () => {
      downloader.failOn = 'Lib.Json';
      const fetcher = new PackageFetcher(index, downloader);

      await expect(fetcher.processPackage(request(), { progress: sink })).rejects.toThrow(
        'connection reset: Lib.Json'
      );
      expect(progress.slice(-2)).toEqual(['downloading Lib.Json 2.5.0', 'Error: connection reset: Lib.Json']);
      expect(await fs.readdir(path.join(tempDir, 'download'))).toEqual(['App.Core.1.0.0.nupkg']);
    });

    it('인덱스 전송 실패는 루트 해결에서도 전파', async () => {
      const failingIndex: PackageIndex = {
        getCandidates: async () => {
          throw new NuGetFetchError('TransportFailure', 'socket hang up');
        },
      };
      const fetcher = new PackageFetcher(failingIndex, downloader);

      await expect(fetcher.processPackage(request(), { progress: sink })).rejects.toSatisfy(
        (error: unknown) => isNuGetFetchError(error, 'TransportFailure')
      );
      expect(progress).toEqual(['Error: socket hang up']);
    });
  });

  describe('resolveClosure', () => {
    it('다운로드 없이 클로저와 미해결 의존성 반환', async () => {
      index.add(
        createPackage('Plugin', '1.0.0', {
          dependencies: [
            { id: 'App.Core', range: '[1.0.0]' },
            { id: 'Gone.Lib', range: '1.0.0' },
          ],
        })
      );
      const fetcher = new PackageFetcher(index, downloader);

      const result = await fetcher.resolveClosure(request({ packageId: 'Plugin' }), { progress: sink });

      expect(result.status).toBe('done');
      expect(result.resolved.map((p) => p.id)).toEqual(['Plugin', 'App.Core', 'Lib.Json', 'Lib.Logging']);
      expect(result.unresolved).toEqual([
        { parent: 'Plugin 1.0.0', id: 'Gone.Lib', range: '1.0.0', reason: 'not found' },
      ]);
      expect(progress).not.toContain('Done.');
      expect(downloader.transfers).toEqual([]);
    });

    it('전송 실패는 한 번 보고한 뒤 전파', async () => {
      const failingIndex: PackageIndex = {
        getCandidates: async () => {
          throw new NuGetFetchError('TransportFailure', 'socket hang up');
        },
      };
      const fetcher = new PackageFetcher(failingIndex, downloader);

      await expect(fetcher.resolveClosure(request(), { progress: sink })).rejects.toSatisfy(
        (error: unknown) => isNuGetFetchError(error, 'TransportFailure')
      );
      expect(progress).toEqual(['Error: socket hang up']);
    });

    it('버전을 해석할 수 없는 후보가 섞여 있어도 해결', async () => {
      const mixed = new InMemoryPackageIndex([createPackage('A', '1.0.0'), createPackage('A', '1.0.0-')]);
      const fetcher = new PackageFetcher(mixed, downloader);

      const result = await fetcher.resolveClosure(
        request({ packageId: 'A', version: undefined, includePrerelease: true }),
        { progress: sink }
      );

      expect(result.status).toBe('done');
      expect(result.resolved.map((p) => `${p.id} ${p.version}`)).toEqual(['A 1.0.0']);
    });
  });

  it('createPackageFetcher는 설정값으로 생성', () => {
    const fetcher = createPackageFetcher(DEFAULT_CONFIG);
    expect(fetcher).toBeInstanceOf(PackageFetcher);
  });
});
