import * as path from 'path';
import { Config } from '../core/config';
import { FetchRequest } from '../types';

// download/resolve 공통 옵션
export interface FetchCommandOptions {
  package?: string;
  pkgVersion?: string;
  prerelease?: boolean;
  output?: string;
  framework?: string[];
  source?: string;
}

/**
 * CLI 옵션을 설정값 위에 덮어써서 실행 요청 생성
 */
export function buildFetchRequest(options: FetchCommandOptions, config: Config): FetchRequest {
  const packageId = options.package?.trim();
  if (!packageId) {
    throw new Error('패키지 id(-p)를 지정하세요');
  }

  return {
    packageId,
    version: options.pkgVersion?.trim() || undefined,
    includePrerelease: options.prerelease ?? config.includePrerelease,
    downloadDir: path.resolve(options.output ?? config.downloadDir),
    targetFrameworks:
      options.framework && options.framework.length > 0 ? options.framework : config.targetFrameworks,
  };
}

/**
 * 요청 단위 설정 (service index 덮어쓰기)
 */
export function applyCommandConfig(options: FetchCommandOptions, config: Config): Config {
  return options.source ? { ...config, serviceIndexUrl: options.source } : config;
}
