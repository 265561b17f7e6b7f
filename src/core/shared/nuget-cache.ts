/**
 * NuGet V3 인덱스 조회 및 공유 캐시
 * service index에서 registration 리소스를 찾고, 패키지 id별 후보 버전 목록을 가져온다.
 */

import axios, { AxiosInstance } from 'axios';
import logger from '../../utils/logger';
import { DependencySet, PackageIndex, PackageRef } from '../../types';
import {
  CandidateCacheEntry,
  RegistrationDependencyGroup,
  RegistrationIndex,
  RegistrationLeaf,
  RegistrationPage,
  ServiceEndpoints,
  ServiceIndex,
  ServiceResource,
} from './nuget-types';
import { compareVersions, formatVersion, parseVersion, parseVersionRange } from './version-utils';
import { NuGetFetchError, toTransportFailure } from './errors';

/** 기본 TTL: 5분 */
const DEFAULT_TTL = 5 * 60 * 1000;

/** 기본 요청 타임아웃: 30초 */
const DEFAULT_TIMEOUT = 30000;

export const DEFAULT_SERVICE_INDEX_URL = 'https://api.nuget.org/v3/index.json';

// registration 리소스 우선순위 (SemVer 2.0 패키지를 포함하는 hive 우선)
const REGISTRATION_TYPES = [
  'RegistrationsBaseUrl/3.6.0',
  'RegistrationsBaseUrl/Versioned',
  'RegistrationsBaseUrl/3.4.0',
  'RegistrationsBaseUrl/3.0.0-rc',
  'RegistrationsBaseUrl/3.0.0-beta',
  'RegistrationsBaseUrl',
];

const PACKAGE_BASE_ADDRESS_TYPE = 'PackageBaseAddress/3.0.0';

/**
 * 모듈 레벨 공유 캐시
 */
const candidateCache: Map<string, CandidateCacheEntry<PackageRef[]>> = new Map();
const endpointCache: Map<string, ServiceEndpoints> = new Map();

/**
 * 진행 중인 요청 추적 (중복 요청 방지)
 */
const pendingRequests: Map<string, Promise<PackageRef[]>> = new Map();

/**
 * Axios 클라이언트 (싱글톤)
 */
let sharedClient: AxiosInstance | null = null;
let sharedClientTimeout = DEFAULT_TIMEOUT;

function getClient(timeout: number = DEFAULT_TIMEOUT): AxiosInstance {
  if (!sharedClient || sharedClientTimeout !== timeout) {
    sharedClient = axios.create({
      timeout,
      headers: {
        Accept: 'application/json',
        'User-Agent': 'nupkg-fetch/1.0',
      },
    });
    sharedClientTimeout = timeout;
  }
  return sharedClient;
}

/**
 * 캐시 옵션
 */
export interface NuGetCacheOptions {
  /** service index URL */
  serviceIndexUrl?: string;
  /** TTL (ms) */
  ttl?: number;
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  /** 강제 새로고침 */
  forceRefresh?: boolean;
}

function getHttpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const { response } = error;
  if (typeof response !== 'object' || response === null || !('status' in response)) {
    return undefined;
  }
  return typeof response.status === 'number' ? response.status : undefined;
}

function hasType(resource: ServiceResource, type: string): boolean {
  const types = Array.isArray(resource['@type']) ? resource['@type'] : [resource['@type']];
  return types.includes(type);
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * service index에서 필요한 리소스 URL 조회 (캐싱)
 */
export async function discoverEndpoints(
  serviceIndexUrl: string = DEFAULT_SERVICE_INDEX_URL,
  timeout: number = DEFAULT_TIMEOUT
): Promise<ServiceEndpoints> {
  const cached = endpointCache.get(serviceIndexUrl);
  if (cached) return cached;

  let index: ServiceIndex;
  try {
    logger.debug('service index 요청', { serviceIndexUrl });
    const response = await getClient(timeout).get<ServiceIndex>(serviceIndexUrl);
    index = response.data;
  } catch (error) {
    logger.error('service index 조회 실패', { serviceIndexUrl, error: String(error) });
    throw toTransportFailure(error, `service index 조회 실패 (${serviceIndexUrl})`);
  }

  const resources = Array.isArray(index.resources) ? index.resources : [];
  let registrationsBaseUrl: string | undefined;

  for (const type of REGISTRATION_TYPES) {
    const resource = resources.find((r) => hasType(r, type));
    if (resource) {
      registrationsBaseUrl = withTrailingSlash(resource['@id']);
      break;
    }
  }

  if (!registrationsBaseUrl) {
    throw new NuGetFetchError(
      'TransportFailure',
      `RegistrationsBaseUrl 리소스가 없습니다: ${serviceIndexUrl}`
    );
  }

  const packageBase = resources.find((r) => hasType(r, PACKAGE_BASE_ADDRESS_TYPE));
  const endpoints: ServiceEndpoints = {
    registrationsBaseUrl,
    packageBaseAddress: packageBase ? withTrailingSlash(packageBase['@id']) : undefined,
  };

  endpointCache.set(serviceIndexUrl, endpoints);
  return endpoints;
}

/**
 * 의존성 그룹 변환
 */
function decodeDependencySets(groups: RegistrationDependencyGroup[] | undefined): DependencySet[] {
  if (!groups || !Array.isArray(groups)) return [];

  return groups.map((group) => ({
    targetFramework: group.targetFramework?.trim() || undefined,
    dependencies: (group.dependencies ?? [])
      .filter((dep) => dep.id)
      .map((dep) => ({
        id: dep.id,
        range: parseVersionRange(dep.range),
        rangeText: dep.range?.trim() ?? '',
      })),
  }));
}

/**
 * registration leaf를 PackageRef로 변환 (isLatestRelease는 전체 목록 기준으로 나중에 설정)
 */
function decodeLeaf(leaf: RegistrationLeaf, endpoints: ServiceEndpoints): PackageRef | null {
  const entry = leaf.catalogEntry;
  const parsed = entry ? parseVersion(entry.version) : null;

  if (!entry || !parsed) {
    logger.warn('버전을 해석할 수 없는 항목 제외', { id: entry?.id, version: entry?.version });
    return null;
  }

  const version = formatVersion(parsed);
  const lowerId = entry.id.toLowerCase();
  const lowerVersion = version.toLowerCase();
  const fallbackUrl = endpoints.packageBaseAddress
    ? `${endpoints.packageBaseAddress}${lowerId}/${lowerVersion}/${lowerId}.${lowerVersion}.nupkg`
    : '';

  return {
    id: entry.id,
    version,
    title: entry.title?.trim() || entry.id,
    isPrerelease: parsed.releaseLabels.length > 0,
    isLatestRelease: false,
    listed: entry.listed ?? true,
    downloadUrl: leaf.packageContent || fallbackUrl,
    dependencySets: decodeDependencySets(entry.dependencyGroups),
  };
}

/**
 * 최신 정식 릴리스 표시 (listed이면서 프리릴리스가 아닌 최고 버전)
 */
export function markLatestRelease(candidates: PackageRef[]): PackageRef[] {
  let latest: PackageRef | null = null;

  for (const candidate of candidates) {
    if (!candidate.listed || candidate.isPrerelease) continue;
    if (parseVersion(candidate.version) === null) continue;
    if (!latest || compareVersions(candidate.version, latest.version) > 0) {
      latest = candidate;
    }
  }

  return candidates.map((candidate) => ({
    ...candidate,
    isLatestRelease: candidate === latest,
  }));
}

async function fetchRegistrationLeaves(
  client: AxiosInstance,
  registrationUrl: string
): Promise<RegistrationLeaf[] | null> {
  let index: RegistrationIndex;
  try {
    const response = await client.get<RegistrationIndex>(registrationUrl);
    index = response.data;
  } catch (error) {
    // 등록되지 않은 패키지
    if (getHttpStatus(error) === 404) {
      return null;
    }
    throw error;
  }

  const leaves: RegistrationLeaf[] = [];
  for (const page of index.items ?? []) {
    let items = page.items;

    // 인라인되지 않은 페이지는 별도 조회
    if (!items) {
      logger.debug('registration 페이지 요청', { page: page['@id'] });
      const pageResponse = await client.get<RegistrationPage>(page['@id']);
      items = pageResponse.data.items ?? [];
    }

    leaves.push(...items);
  }

  return leaves;
}

/**
 * 패키지 후보 목록 가져오기 (공유 캐시 사용)
 * 등록되지 않은 id는 빈 배열
 */
export async function fetchCandidates(
  packageId: string,
  options: NuGetCacheOptions = {}
): Promise<PackageRef[]> {
  const {
    serviceIndexUrl = DEFAULT_SERVICE_INDEX_URL,
    ttl = DEFAULT_TTL,
    timeout = DEFAULT_TIMEOUT,
    forceRefresh = false,
  } = options;

  const lowerId = packageId.toLowerCase();
  const cacheKey = `${serviceIndexUrl}:${lowerId}`;
  const now = Date.now();

  // 1. 캐시 확인
  if (!forceRefresh) {
    const cached = candidateCache.get(cacheKey);
    if (cached && now - cached.fetchedAt < ttl) {
      logger.debug('NuGet 캐시 히트', {
        package: packageId,
        age: Math.round((now - cached.fetchedAt) / 1000),
      });
      return cached.value;
    }
  }

  // 2. 진행 중인 동일 요청 대기
  const pending = pendingRequests.get(cacheKey);
  if (pending) {
    logger.debug('NuGet 중복 요청 대기', { package: packageId });
    return pending;
  }

  // 3. API 요청
  const requestPromise = (async (): Promise<PackageRef[]> => {
    try {
      const endpoints = await discoverEndpoints(serviceIndexUrl, timeout);
      const client = getClient(timeout);
      const registrationUrl = `${endpoints.registrationsBaseUrl}${encodeURIComponent(lowerId)}/index.json`;

      logger.debug('NuGet registration 요청', { package: packageId, registrationUrl });

      const leaves = await fetchRegistrationLeaves(client, registrationUrl);
      const decoded = (leaves ?? [])
        .map((leaf) => decodeLeaf(leaf, endpoints))
        .filter((candidate): candidate is PackageRef => candidate !== null);
      const candidates = markLatestRelease(decoded);

      candidateCache.set(cacheKey, {
        value: candidates,
        fetchedAt: Date.now(),
      });

      logger.debug('NuGet 응답 캐시 저장', {
        package: packageId,
        versions: candidates.length,
      });

      return candidates;
    } catch (error) {
      logger.error('NuGet registration 조회 실패', { package: packageId, error: String(error) });
      throw toTransportFailure(error, `패키지 정보 조회 실패 (${packageId})`);
    } finally {
      pendingRequests.delete(cacheKey);
    }
  })();

  pendingRequests.set(cacheKey, requestPromise);
  return requestPromise;
}

/**
 * 메모리 캐시 초기화
 */
export function clearNuGetCache(): void {
  const size = candidateCache.size;
  candidateCache.clear();
  endpointCache.clear();
  pendingRequests.clear();
  sharedClient = null;
  logger.debug('NuGet 캐시 초기화', { clearedEntries: size });
}

/**
 * NuGet V3 서버를 PackageIndex로 사용
 */
export class NuGetIndexClient implements PackageIndex {
  private readonly options: NuGetCacheOptions;

  constructor(options: NuGetCacheOptions = {}) {
    this.options = options;
  }

  get serviceIndexUrl(): string {
    return this.options.serviceIndexUrl ?? DEFAULT_SERVICE_INDEX_URL;
  }

  getCandidates(packageId: string): Promise<PackageRef[]> {
    return fetchCandidates(packageId, this.options);
  }
}
