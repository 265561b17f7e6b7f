/**
 * NuGet 버전 리졸버
 *
 * 인덱스에서 조회한 후보 목록 중 하나의 버전을 선택한다.
 * - resolveLatest: 최신 버전 (프리릴리스 제외 시 "최신 정식 릴리스" 표시된 후보만)
 * - resolveExact: 지정 버전 (프리릴리스 스위치 무시)
 * - resolveInRange: 범위 내 최고 버전 (의존성 해결용)
 * 여러 후보가 남으면 항상 가장 높은 버전을 선택한다.
 */

import { PackageIndex, PackageRef, VersionRange } from '../../types';
import logger from '../../utils/logger';
import { NuGetFetchError } from '../shared/errors';
import {
  compareParsedVersions,
  compareVersions,
  formatVersionRange,
  parseVersion,
  parseVersionStrict,
  satisfiesRange,
} from '../shared/version-utils';

export class VersionResolver {
  private readonly index: PackageIndex;

  constructor(index: PackageIndex) {
    this.index = index;
  }

  /**
   * 최신 버전 해결
   */
  async resolveLatest(packageId: string, includePrerelease: boolean): Promise<PackageRef> {
    let candidates = await this.getParsableCandidates(packageId);

    if (!includePrerelease) {
      candidates = candidates.filter((c) => !c.isPrerelease && c.isLatestRelease);
    }

    const latest = pickHighest(candidates);
    if (!latest) {
      throw new NuGetFetchError('PackageNotFound', `패키지를 찾을 수 없습니다: ${packageId}`);
    }

    logger.debug('최신 버전 해결', { packageId, version: latest.version, includePrerelease });
    return latest;
  }

  /**
   * 지정 버전 해결 (버전 문자열을 먼저 검증하므로 잘못된 버전은 인덱스를 조회하지 않음)
   */
  async resolveExact(packageId: string, versionString: string): Promise<PackageRef> {
    const requested = parseVersionStrict(versionString);
    const candidates = await this.getParsableCandidates(packageId);

    const match = candidates.find(
      (c) => compareParsedVersions(parseVersionStrict(c.version), requested) === 0
    );
    if (!match) {
      throw new NuGetFetchError(
        'PackageNotFound',
        `패키지를 찾을 수 없습니다: ${packageId} ${versionString}`
      );
    }

    return match;
  }

  /**
   * 범위 내 최고 버전 해결
   */
  async resolveInRange(
    packageId: string,
    range: VersionRange,
    includePrerelease: boolean
  ): Promise<PackageRef> {
    const candidates = (await this.getParsableCandidates(packageId)).filter(
      (c) => (includePrerelease || !c.isPrerelease) && satisfiesRange(c.version, range)
    );

    const best = pickHighest(candidates);
    if (!best) {
      throw new NuGetFetchError(
        'PackageNotFound',
        `범위에 맞는 버전이 없습니다: ${packageId} ${formatVersionRange(range)}`
      );
    }

    return best;
  }

  // 버전을 해석할 수 없는 후보는 선택 대상에서 제외
  private async getParsableCandidates(packageId: string): Promise<PackageRef[]> {
    const candidates = await this.index.getCandidates(packageId);
    return candidates.filter((c) => {
      if (parseVersion(c.version) !== null) return true;
      logger.warn('버전을 해석할 수 없는 후보 제외', { packageId, version: c.version });
      return false;
    });
  }
}

/**
 * 가장 높은 버전의 후보 (없으면 null)
 */
export function pickHighest(candidates: readonly PackageRef[]): PackageRef | null {
  let best: PackageRef | null = null;
  for (const candidate of candidates) {
    if (!best || compareVersions(candidate.version, best.version) > 0) {
      best = candidate;
    }
  }
  return best;
}
