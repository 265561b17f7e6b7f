// 공통 모듈 진입점

// 에러
export { NuGetFetchError, isNuGetFetchError, toTransportFailure } from './errors';
export type { NuGetFetchErrorCode } from './errors';

// 버전/범위 유틸리티
export {
  parseVersion,
  parseVersionStrict,
  formatVersion,
  normalizeVersion,
  isPrereleaseVersion,
  compareParsedVersions,
  compareVersions,
  parseVersionRange,
  satisfiesRange,
  formatVersionRange,
} from './version-utils';
export type { NuGetVersion } from './version-utils';

// 프레임워크 유틸리티
export { getFrameworkIdentifier, isFrameworkAccepted } from './framework-utils';

// 패키지 유틸리티
export { ARCHIVE_EXTENSION, getFullName, getPackageKey, getArchiveFileName } from './package-utils';

// NuGet V3 인덱스
export {
  NuGetIndexClient,
  fetchCandidates,
  discoverEndpoints,
  markLatestRelease,
  clearNuGetCache,
  DEFAULT_SERVICE_INDEX_URL,
} from './nuget-cache';
export type { NuGetCacheOptions } from './nuget-cache';
export * from './nuget-types';
