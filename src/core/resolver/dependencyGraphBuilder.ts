/**
 * NuGet 의존성 그래프 빌더
 *
 * 핵심 알고리즘:
 * 1. 깊이 우선(pre-order) 탐색. 재귀 대신 명시적 스택 사용
 * 2. 프레임워크 필터를 통과한 의존성 그룹만 선언 순서대로 처리
 * 3. (id, version)이 이미 해결된 패키지는 다시 내려가지 않음 (중복 제거 + 순환 차단)
 * 4. 각 의존성 처리 전에 중지 요청 확인
 *
 * 해결된 목록은 호출마다 새로 만들어 반환하므로 인스턴스를 재사용해도 초기화가 필요 없다.
 */

import {
  DependencySpec,
  PackageRef,
  ProgressSink,
  StopPredicate,
  UnresolvedDependency,
} from '../../types';
import logger from '../../utils/logger';
import { isNuGetFetchError } from '../shared/errors';
import { isFrameworkAccepted } from '../shared/framework-utils';
import { getFullName, getPackageKey } from '../shared/package-utils';
import { VersionResolver } from './versionResolver';

export interface GraphBuildOptions {
  includePrerelease: boolean;
  /** 허용 프레임워크 식별자. 비어 있으면 모두 허용 */
  targetFrameworks: readonly string[];
  stopRequested?: StopPredicate;
  progress?: ProgressSink;
}

export interface GraphBuildResult {
  /** 발견 순서대로 정렬된 해결 목록 (루트 포함) */
  resolved: PackageRef[];
  unresolved: UnresolvedDependency[];
  stopped: boolean;
}

// 탐색 스택 프레임
interface TraversalFrame {
  pkg: PackageRef;
  dependencies: DependencySpec[];
  cursor: number;
}

const NEVER_STOP: StopPredicate = () => false;
const NO_PROGRESS: ProgressSink = () => undefined;

/**
 * 패키지의 의존성 중 허용 프레임워크에 해당하는 것만 선언 순서대로 수집
 */
export function collectDependencies(
  pkg: PackageRef,
  targetFrameworks: readonly string[]
): DependencySpec[] {
  return pkg.dependencySets
    .filter((set) => isFrameworkAccepted(set.targetFramework, targetFrameworks))
    .flatMap((set) => set.dependencies);
}

export class DependencyGraphBuilder {
  private readonly resolver: VersionResolver;

  constructor(resolver: VersionResolver) {
    this.resolver = resolver;
  }

  /**
   * 루트에서 시작해 전체 의존성 클로저를 만든다
   */
  async build(root: PackageRef, options: GraphBuildOptions): Promise<GraphBuildResult> {
    const stopRequested = options.stopRequested ?? NEVER_STOP;
    const progress = options.progress ?? NO_PROGRESS;

    const resolved: PackageRef[] = [root];
    const known = new Set<string>([getPackageKey(root)]);
    const unresolved: UnresolvedDependency[] = [];

    const stack: TraversalFrame[] = [this.createFrame(root, options.targetFrameworks)];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.cursor >= frame.dependencies.length) {
        stack.pop();
        continue;
      }

      const dependency = frame.dependencies[frame.cursor];
      frame.cursor++;

      if (stopRequested()) {
        logger.info('의존성 탐색 중지 요청', { resolved: resolved.length });
        return { resolved, unresolved, stopped: true };
      }

      const parentName = getFullName(frame.pkg);
      const child = await this.resolveDependency(parentName, dependency, options.includePrerelease);

      if (!child) {
        unresolved.push({
          parent: parentName,
          id: dependency.id,
          range: dependency.rangeText,
          reason: dependency.range ? 'not found' : 'invalid range',
        });
        progress(`${parentName} -> ${dependency.id} ${dependency.rangeText || '(*)'}: not found, skipped.`);
        continue;
      }

      progress(`${parentName} -> ${getFullName(child)}`);

      const key = getPackageKey(child);
      if (known.has(key)) {
        continue;
      }

      known.add(key);
      resolved.push(child);
      stack.push(this.createFrame(child, options.targetFrameworks));
    }

    logger.info('의존성 탐색 완료', {
      root: getFullName(root),
      resolved: resolved.length,
      unresolved: unresolved.length,
    });

    return { resolved, unresolved, stopped: false };
  }

  private createFrame(pkg: PackageRef, targetFrameworks: readonly string[]): TraversalFrame {
    return { pkg, dependencies: collectDependencies(pkg, targetFrameworks), cursor: 0 };
  }

  /**
   * 단일 의존성 해결. 찾을 수 없거나 범위가 잘못된 경우 null (경고 후 건너뜀)
   * 전송 실패 등 다른 에러는 그대로 전파
   */
  private async resolveDependency(
    parentName: string,
    dependency: DependencySpec,
    includePrerelease: boolean
  ): Promise<PackageRef | null> {
    if (!dependency.range) {
      logger.warn('의존성 버전 범위를 해석할 수 없어 건너뜀', {
        parent: parentName,
        id: dependency.id,
        range: dependency.rangeText,
      });
      return null;
    }

    try {
      return await this.resolver.resolveInRange(dependency.id, dependency.range, includePrerelease);
    } catch (error) {
      if (isNuGetFetchError(error, 'PackageNotFound') || isNuGetFetchError(error, 'InvalidVersion')) {
        logger.warn('의존성을 찾을 수 없어 건너뜀', {
          parent: parentName,
          id: dependency.id,
          range: dependency.rangeText,
        });
        return null;
      }
      throw error;
    }
  }
}
