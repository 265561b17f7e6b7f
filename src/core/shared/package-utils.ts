// 패키지 식별/파일명 유틸리티

import { PackageRef } from '../../types';
import { normalizeVersion } from './version-utils';

export const ARCHIVE_EXTENSION = 'nupkg';

/**
 * 표시용 전체 이름 (예: "Newtonsoft.Json 13.0.3")
 */
export function getFullName(pkg: Pick<PackageRef, 'id' | 'version'>): string {
  return `${pkg.id} ${pkg.version}`;
}

/**
 * (id, version) 식별 키. id는 대소문자 무시, 버전은 정규화
 */
export function getPackageKey(pkg: Pick<PackageRef, 'id' | 'version'>): string {
  return `${pkg.id.toLowerCase()}@${normalizeVersion(pkg.version).toLowerCase()}`;
}

/**
 * 다운로드 파일명 (<id>.<version>.nupkg)
 */
export function getArchiveFileName(pkg: Pick<PackageRef, 'id' | 'version'>): string {
  return `${pkg.id}.${pkg.version}.${ARCHIVE_EXTENSION}`;
}
