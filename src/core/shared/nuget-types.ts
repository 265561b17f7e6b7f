/**
 * NuGet V3 API 응답 타입 정의
 * (service index, registration index/page/leaf)
 */

// ====================
// Service index
// ====================

export interface ServiceResource {
  '@id': string;
  '@type': string | string[];
  comment?: string;
}

export interface ServiceIndex {
  version: string;
  resources: ServiceResource[];
}

/** service index에서 찾은 리소스 URL */
export interface ServiceEndpoints {
  registrationsBaseUrl: string;
  packageBaseAddress?: string;
}

// ====================
// Registration
// ====================

export interface RegistrationDependency {
  '@id'?: string;
  id: string;
  range?: string;
}

export interface RegistrationDependencyGroup {
  '@id'?: string;
  targetFramework?: string;
  dependencies?: RegistrationDependency[];
}

export interface RegistrationCatalogEntry {
  '@id'?: string;
  id: string;
  version: string;
  title?: string;
  listed?: boolean;
  description?: string;
  authors?: string | string[];
  dependencyGroups?: RegistrationDependencyGroup[];
}

export interface RegistrationLeaf {
  '@id'?: string;
  catalogEntry: RegistrationCatalogEntry;
  packageContent?: string;
}

export interface RegistrationPage {
  '@id': string;
  count: number;
  lower: string;
  upper: string;
  /** 인라인되지 않은 페이지는 items가 없음 (@id로 별도 조회) */
  items?: RegistrationLeaf[];
}

export interface RegistrationIndex {
  '@id'?: string;
  count: number;
  items: RegistrationPage[];
}

// ====================
// 캐시
// ====================

export interface CandidateCacheEntry<T> {
  value: T;
  fetchedAt: number;
}
