// ============================================
// 패키지 관련 타입
// ============================================

/** 버전 범위 (NuGet 구간 표기 [1.0,2.0) 등을 파싱한 결과) */
export interface VersionRange {
  minVersion?: string;
  minInclusive: boolean;
  maxVersion?: string;
  maxInclusive: boolean;
  /** 원본 표기 (메시지 출력용) */
  originalText?: string;
}

/** 의존성 스펙 */
export interface DependencySpec {
  id: string;
  /** 파싱하지 못한 범위 표기는 null */
  range: VersionRange | null;
  rangeText: string;
}

/** 타겟 프레임워크별 의존성 그룹 */
export interface DependencySet {
  /** 타겟 프레임워크 모니커 (예: net8.0, .NETStandard2.0). 없으면 모든 프레임워크 */
  targetFramework?: string;
  dependencies: DependencySpec[];
}

/** 인덱스에서 조회한 패키지 (한 번 해결되면 변경하지 않음) */
export interface PackageRef {
  readonly id: string;
  readonly version: string;
  readonly title: string;
  readonly isPrerelease: boolean;
  /** 최신 정식 릴리스 여부 */
  readonly isLatestRelease: boolean;
  readonly listed: boolean;
  readonly downloadUrl: string;
  readonly dependencySets: readonly DependencySet[];
}

/** 해결하지 못한 의존성 */
export interface UnresolvedDependency {
  parent: string;
  id: string;
  range: string;
  reason: string;
}

// ============================================
// 협력자 계약
// ============================================

/** 체크포인트마다 호출되는 중지 요청 여부 확인 함수 */
export type StopPredicate = () => boolean;

/** 진행 메시지 수신 함수 */
export type ProgressSink = (message: string) => void;

/** 패키지 인덱스 (외부 서비스) */
export interface PackageIndex {
  /** 패키지 id의 모든 후보 버전 조회. 존재하지 않는 id는 빈 배열 */
  getCandidates(packageId: string): Promise<PackageRef[]>;
}

/** 다운로드 진행 이벤트 */
export interface DownloadProgressEvent {
  itemId: string;
  progress: number;
  downloadedBytes: number;
  totalBytes: number;
  speed: number;
}

/** 패키지 아카이브 전송 */
export interface IPackageDownloader {
  downloadArchive(
    pkg: PackageRef,
    filePath: string,
    onProgress?: (progress: DownloadProgressEvent) => void
  ): Promise<void>;
}

// ============================================
// 실행 관련 타입
// ============================================

/** 실행 요청 */
export interface FetchRequest {
  packageId: string;
  /** 비어 있으면 최신 버전 */
  version?: string;
  includePrerelease: boolean;
  downloadDir: string;
  /** 허용 프레임워크 식별자. 비어 있으면 모두 허용 */
  targetFrameworks: string[];
}

/** 실행 상태 */
export type FetchStatus = 'done' | 'stopped' | 'failed';

/** 실행 결과 */
export interface FetchResult {
  status: FetchStatus;
  resolved: PackageRef[];
  unresolved: UnresolvedDependency[];
  downloaded: string[];
  skipped: string[];
  error?: string;
}
