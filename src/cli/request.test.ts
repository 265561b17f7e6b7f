import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { applyCommandConfig, buildFetchRequest } from './request';
import { DEFAULT_CONFIG } from '../core/config';

describe('buildFetchRequest', () => {
  it('옵션이 없으면 설정값 사용', () => {
    const config = { ...DEFAULT_CONFIG, includePrerelease: true, targetFrameworks: ['.NETStandard'] };

    const request = buildFetchRequest({ package: ' Sample.Lib ' }, config);

    expect(request).toEqual({
      packageId: 'Sample.Lib',
      version: undefined,
      includePrerelease: true,
      downloadDir: path.resolve('./download/'),
      targetFrameworks: ['.NETStandard'],
    });
  });

  it('CLI 옵션이 설정값보다 우선', () => {
    const request = buildFetchRequest(
      {
        package: 'Sample.Lib',
        pkgVersion: '1.2.3',
        prerelease: false,
        output: '/tmp/out',
        framework: ['.NETFramework', '.NETCore'],
      },
      { ...DEFAULT_CONFIG, includePrerelease: true }
    );

    expect(request.version).toBe('1.2.3');
    expect(request.includePrerelease).toBe(false);
    expect(request.downloadDir).toBe(path.resolve('/tmp/out'));
    expect(request.targetFrameworks).toEqual(['.NETFramework', '.NETCore']);
  });

  it('빈 버전은 최신 버전 요청', () => {
    expect(buildFetchRequest({ package: 'Sample.Lib', pkgVersion: '   ' }, DEFAULT_CONFIG).version).toBeUndefined();
  });

  it('패키지 id가 없으면 에러', () => {
    expect(() => buildFetchRequest({}, DEFAULT_CONFIG)).toThrow('패키지 id(-p)를 지정하세요');
  });
});

describe('applyCommandConfig', () => {
  it('--source가 있으면 service index 덮어쓰기', () => {
    const config = applyCommandConfig({ source: 'https://nuget.test/v3/index.json' }, DEFAULT_CONFIG);
    expect(config.serviceIndexUrl).toBe('https://nuget.test/v3/index.json');
    expect(DEFAULT_CONFIG.serviceIndexUrl).toBe('https://api.nuget.org/v3/index.json');
  });
});
