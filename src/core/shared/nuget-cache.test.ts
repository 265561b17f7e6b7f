/**
 * nuget-cache.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import axios from 'axios';
import {
  fetchCandidates,
  discoverEndpoints,
  clearNuGetCache,
  markLatestRelease,
  NuGetIndexClient,
} from './nuget-cache';
import { RegistrationIndex, RegistrationLeaf, RegistrationPage, ServiceIndex } from './nuget-types';
import { isNuGetFetchError } from './errors';
import { createPackage } from '../../test-utils/nuget-fixtures';

// axios 모킹
vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

const SERVICE_INDEX_URL = 'https://nuget.test/v3/index.json';
const REGISTRATION_BASE = 'https://nuget.test/registration5-gz-semver2/';

const serviceIndex: ServiceIndex = {
  version: '3.0.0',
  resources: [
    { '@id': 'https://nuget.test/registration5/', '@type': 'RegistrationsBaseUrl' },
    { '@id': 'https://nuget.test/registration5-gz-semver2', '@type': 'RegistrationsBaseUrl/3.6.0' },
    { '@id': 'https://nuget.test/flatcontainer/', '@type': 'PackageBaseAddress/3.0.0' },
  ],
};

function createLeaf(
  id: string,
  version: string,
  options: { listed?: boolean; packageContent?: string; dependencyGroups?: RegistrationLeaf['catalogEntry']['dependencyGroups'] } = {}
): RegistrationLeaf {
  return {
    catalogEntry: {
      id,
      version,
      listed: options.listed,
      dependencyGroups: options.dependencyGroups,
    },
    packageContent: options.packageContent,
  };
}

function inlineIndex(leaves: RegistrationLeaf[]): RegistrationIndex {
  return {
    count: 1,
    items: [{ '@id': `${REGISTRATION_BASE}page/0`, count: leaves.length, lower: '', upper: '', items: leaves }],
  };
}

// URL별 응답 등록
let routes: Map<string, unknown>;

const mockGet = vi.fn(async (url: string) => {
  if (!routes.has(url)) {
    return Promise.reject({ message: 'Request failed with status code 404', response: { status: 404 } });
  }
  const data = routes.get(url);
  if (data instanceof Error) {
    throw data;
  }
  return { data };
});
const mockClient = { get: mockGet };

describe('nuget-cache', () => {
  beforeEach(() => {
    clearNuGetCache();
    vi.clearAllMocks();
    mockedAxios.create.mockReturnValue(mockClient as never);
    routes = new Map<string, unknown>([[SERVICE_INDEX_URL, serviceIndex]]);
  });

  afterEach(() => {
    clearNuGetCache();
  });

  describe('discoverEndpoints', () => {
    it('3.6.0 registration 리소스를 우선 사용하고 끝에 / 추가', async () => {
      const endpoints = await discoverEndpoints(SERVICE_INDEX_URL);

      expect(endpoints).toEqual({
        registrationsBaseUrl: REGISTRATION_BASE,
        packageBaseAddress: 'https://nuget.test/flatcontainer/',
      });
    });

    it('registration 리소스가 없으면 TransportFailure', async () => {
      routes.set(SERVICE_INDEX_URL, { version: '3.0.0', resources: [] });

      await expect(discoverEndpoints(SERVICE_INDEX_URL)).rejects.toSatisfy((error: unknown) =>
        isNuGetFetchError(error, 'TransportFailure')
      );
    });

    it('service index 요청 실패는 TransportFailure', async () => {
      routes.set(SERVICE_INDEX_URL, new Error('getaddrinfo ENOTFOUND nuget.test'));

      await expect(discoverEndpoints(SERVICE_INDEX_URL)).rejects.toSatisfy((error: unknown) =>
        isNuGetFetchError(error, 'TransportFailure')
      );
    });
  });

  describe('fetchCandidates', () => {
    it('인라인 페이지의 후보를 변환', async () => {
      routes.set(
        `${REGISTRATION_BASE}sample.lib/index.json`,
        inlineIndex([
          createLeaf('Sample.Lib', '1.0', {
            dependencyGroups: [
              {
                targetFramework: '.NETStandard2.0',
                dependencies: [{ id: 'Sample.Core', range: '[2.1.0, )' }],
              },
            ],
          }),
          createLeaf('Sample.Lib', '2.0.0', {
            packageContent: 'https://nuget.test/content/sample.lib.2.0.0.nupkg',
          }),
        ])
      );

      const candidates = await fetchCandidates('Sample.Lib', { serviceIndexUrl: SERVICE_INDEX_URL });

      expect(candidates.map((c) => c.version)).toEqual(['1.0.0', '2.0.0']);
      expect(candidates[0].downloadUrl).toBe(
        'https://nuget.test/flatcontainer/sample.lib/1.0.0/sample.lib.1.0.0.nupkg'
      );
      expect(candidates[1].downloadUrl).toBe('https://nuget.test/content/sample.lib.2.0.0.nupkg');
      expect(candidates[0].title).toBe('Sample.Lib');

      const group = candidates[0].dependencySets[0];
      expect(group.targetFramework).toBe('.NETStandard2.0');
      expect(group.dependencies[0].id).toBe('Sample.Core');
      expect(group.dependencies[0].rangeText).toBe('[2.1.0, )');
      expect(group.dependencies[0].range?.minVersion).toBe('2.1.0');
      expect(group.dependencies[0].range?.minInclusive).toBe(true);
    });

    it('인라인되지 않은 페이지는 @id로 추가 조회', async () => {
      const pageUrl = `${REGISTRATION_BASE}paged.lib/page/1.0.0/3.0.0.json`;
      const page: RegistrationPage = {
        '@id': pageUrl,
        count: 2,
        lower: '1.0.0',
        upper: '3.0.0',
        items: [createLeaf('Paged.Lib', '1.0.0'), createLeaf('Paged.Lib', '3.0.0')],
      };
      routes.set(`${REGISTRATION_BASE}paged.lib/index.json`, {
        count: 1,
        items: [{ '@id': pageUrl, count: 2, lower: '1.0.0', upper: '3.0.0' }],
      });
      routes.set(pageUrl, page);

      const candidates = await fetchCandidates('Paged.Lib', { serviceIndexUrl: SERVICE_INDEX_URL });

      expect(candidates.map((c) => c.version)).toEqual(['1.0.0', '3.0.0']);
      expect(mockGet).toHaveBeenCalledWith(pageUrl);
    });

    it('최신 정식 릴리스는 listed 비프리릴리스 중 최고 버전 하나', async () => {
      routes.set(
        `${REGISTRATION_BASE}flags.lib/index.json`,
        inlineIndex([
          createLeaf('Flags.Lib', '1.0.0'),
          createLeaf('Flags.Lib', '1.2.0'),
          createLeaf('Flags.Lib', '1.3.0', { listed: false }),
          createLeaf('Flags.Lib', '2.0.0-preview.1'),
        ])
      );

      const candidates = await fetchCandidates('Flags.Lib', { serviceIndexUrl: SERVICE_INDEX_URL });

      expect(candidates.filter((c) => c.isLatestRelease).map((c) => c.version)).toEqual(['1.2.0']);
      expect(candidates.filter((c) => c.isPrerelease).map((c) => c.version)).toEqual(['2.0.0-preview.1']);
      expect(candidates.find((c) => c.version === '1.3.0')?.listed).toBe(false);
    });

    it('버전을 해석할 수 없는 항목은 제외', async () => {
      routes.set(
        `${REGISTRATION_BASE}odd.lib/index.json`,
        inlineIndex([createLeaf('Odd.Lib', 'not-a-version'), createLeaf('Odd.Lib', '1.0.0')])
      );

      const candidates = await fetchCandidates('Odd.Lib', { serviceIndexUrl: SERVICE_INDEX_URL });

      expect(candidates.map((c) => c.version)).toEqual(['1.0.0']);
    });

    it('등록되지 않은 패키지(404)는 빈 배열', async () => {
      const candidates = await fetchCandidates('No.Such.Package', { serviceIndexUrl: SERVICE_INDEX_URL });
      expect(candidates).toEqual([]);
    });

    it('404 이외의 실패는 TransportFailure', async () => {
      routes.set(`${REGISTRATION_BASE}broken.lib/index.json`, new Error('socket hang up'));

      await expect(
        fetchCandidates('Broken.Lib', { serviceIndexUrl: SERVICE_INDEX_URL })
      ).rejects.toSatisfy((error: unknown) => isNuGetFetchError(error, 'TransportFailure'));
    });

    it('같은 id 재요청 시 캐시 사용 (대소문자 무시)', async () => {
      routes.set(`${REGISTRATION_BASE}cached.lib/index.json`, inlineIndex([createLeaf('Cached.Lib', '1.0.0')]));

      await fetchCandidates('Cached.Lib', { serviceIndexUrl: SERVICE_INDEX_URL });
      await fetchCandidates('cached.lib', { serviceIndexUrl: SERVICE_INDEX_URL });

      // service index 1회 + registration 1회
      expect(mockGet).toHaveBeenCalledTimes(2);
    });

    it('forceRefresh면 캐시 무시', async () => {
      routes.set(`${REGISTRATION_BASE}fresh.lib/index.json`, inlineIndex([createLeaf('Fresh.Lib', '1.0.0')]));

      await fetchCandidates('Fresh.Lib', { serviceIndexUrl: SERVICE_INDEX_URL });
      await fetchCandidates('Fresh.Lib', { serviceIndexUrl: SERVICE_INDEX_URL, forceRefresh: true });

      expect(mockGet).toHaveBeenCalledTimes(3);
    });
  });

  describe('markLatestRelease', () => {
    it('버전을 해석할 수 없는 후보는 최신 정식 릴리스가 될 수 없음', () => {
      const marked = markLatestRelease([createPackage('A', '1.0.0'), createPackage('A', '1.0.0-')]);

      expect(marked.map((c) => c.isLatestRelease)).toEqual([true, false]);
    });
  });

  describe('NuGetIndexClient', () => {
    it('설정한 service index로 후보 조회', async () => {
      routes.set(`${REGISTRATION_BASE}client.lib/index.json`, inlineIndex([createLeaf('Client.Lib', '0.1.0')]));
      const client = new NuGetIndexClient({ serviceIndexUrl: SERVICE_INDEX_URL });

      const candidates = await client.getCandidates('Client.Lib');

      expect(client.serviceIndexUrl).toBe(SERVICE_INDEX_URL);
      expect(candidates.map((c) => c.id)).toEqual(['Client.Lib']);
    });
  });
});
