/**
 * 테스트용 인메모리 인덱스/다운로더
 * 네트워크 없이 리졸버, 그래프 빌더, 다운로드 테스트에 사용합니다.
 */

import * as fs from 'fs-extra';
import {
  DependencySet,
  DownloadProgressEvent,
  IPackageDownloader,
  PackageIndex,
  PackageRef,
} from '../types';
import { isPrereleaseVersion, parseVersionRange } from '../core/shared/version-utils';
import { markLatestRelease } from '../core/shared/nuget-cache';

export interface FixtureDependency {
  id: string;
  range?: string;
  framework?: string;
}

export interface FixtureOptions {
  dependencies?: FixtureDependency[];
  listed?: boolean;
  title?: string;
}

/**
 * 테스트 패키지 생성 (isLatestRelease는 InMemoryPackageIndex에서 계산)
 */
export function createPackage(id: string, version: string, options: FixtureOptions = {}): PackageRef {
  const groups = new Map<string, DependencySet>();

  for (const dep of options.dependencies ?? []) {
    const key = dep.framework ?? '';
    let group = groups.get(key);
    if (!group) {
      group = { targetFramework: dep.framework, dependencies: [] };
      groups.set(key, group);
    }
    group.dependencies.push({
      id: dep.id,
      range: parseVersionRange(dep.range),
      rangeText: dep.range ?? '',
    });
  }

  return {
    id,
    version,
    title: options.title ?? id,
    isPrerelease: isPrereleaseVersion(version),
    isLatestRelease: false,
    listed: options.listed ?? true,
    downloadUrl: `https://packages.test/${id.toLowerCase()}/${version}/${id.toLowerCase()}.${version}.nupkg`,
    dependencySets: [...groups.values()],
  };
}

/**
 * 인메모리 패키지 인덱스
 */
export class InMemoryPackageIndex implements PackageIndex {
  private readonly packages = new Map<string, PackageRef[]>();
  readonly queries: string[] = [];

  constructor(packages: PackageRef[] = []) {
    for (const pkg of packages) {
      this.add(pkg);
    }
  }

  add(pkg: PackageRef): this {
    const key = pkg.id.toLowerCase();
    const list = this.packages.get(key) ?? [];
    list.push(pkg);
    this.packages.set(key, list);
    return this;
  }

  async getCandidates(packageId: string): Promise<PackageRef[]> {
    this.queries.push(packageId);
    return markLatestRelease(this.packages.get(packageId.toLowerCase()) ?? []);
  }
}

/**
 * 인메모리 다운로더 (URL 문자열을 파일 내용으로 기록)
 */
export class InMemoryDownloader implements IPackageDownloader {
  readonly transfers: string[] = [];
  failOn: string | null = null;

  async downloadArchive(
    pkg: PackageRef,
    filePath: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<void> {
    if (this.failOn === pkg.id) {
      throw new Error(`connection reset: ${pkg.id}`);
    }

    this.transfers.push(`${pkg.id} ${pkg.version}`);
    const content = Buffer.from(pkg.downloadUrl);
    await fs.writeFile(filePath, content);

    onProgress?.({
      itemId: `${pkg.id}@${pkg.version}`,
      progress: 100,
      downloadedBytes: content.length,
      totalBytes: content.length,
      speed: 0,
    });
  }
}
